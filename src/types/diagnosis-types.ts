export interface DiagnosisCandidate {
  code: string;
  description: string;
  category: string;
}

/**
 * Canonical diagnosis record as stored in a repository
 */
export interface DiagnosisRecord {
  readonly code: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly versionTag: string;
  readonly active: boolean;
}

export type ImportRunStatus = 'in-progress' | 'committed' | 'rolled-back';

export interface ImportRun {
  readonly document: string;
  totalCandidates: number;
  created: number;
  skipped: number;
  excluded: number;
  currentCategory: string;
  status: ImportRunStatus;
}

export function createDiagnosisRecord(candidate: DiagnosisCandidate, versionTag: string): DiagnosisRecord {
  return {
    code: candidate.code,
    name: candidate.description,
    description: candidate.description,
    category: candidate.category,
    versionTag,
    active: true
  };
}
