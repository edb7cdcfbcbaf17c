import type { DiagnosisRepository } from '../repositories/diagnosis-repository.js';
import { createDiagnosisRecord, DiagnosisCandidate, DiagnosisRecord } from '../types/diagnosis-types.js';
import { toRepositoryError } from '../types/import-errors.js';

export type DedupDecision =
  | { action: 'create'; record: DiagnosisRecord }
  | { action: 'skip'; existing: DiagnosisRecord | null };

/**
 * Create-or-skip decisions for one import run. Existing records are never updated.
 */
export class DiagnosisDeduplicator {
  private repository: DiagnosisRepository;
  private versionTag: string;
  private createdCodes: Set<string> = new Set();

  constructor(repository: DiagnosisRepository, versionTag: string) {
    this.repository = repository;
    this.versionTag = versionTag;
  }

  async decide(candidate: DiagnosisCandidate): Promise<DedupDecision> {
    // Codes created earlier in this run count as existing even before commit
    if (this.createdCodes.has(candidate.code)) {
      return { action: 'skip', existing: null };
    }

    let existing: DiagnosisRecord | undefined;
    try {
      existing = await this.repository.find(candidate.code, this.versionTag);
    } catch (error) {
      throw toRepositoryError(error, 'find');
    }
    if (existing) {
      return { action: 'skip', existing };
    }

    this.createdCodes.add(candidate.code);
    return { action: 'create', record: createDiagnosisRecord(candidate, this.versionTag) };
  }
}
