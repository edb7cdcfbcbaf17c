import type { DiagnosisRecord } from '../types/diagnosis-types.js';
import { DiagnosisRepository, recordKey } from './diagnosis-repository.js';
import { RepositoryError } from '../types/import-errors.js';

/**
 * Process-local repository with the same staging discipline as the FHIR one
 */
export class InMemoryDiagnosisRepository implements DiagnosisRepository {
  private committed: Map<string, DiagnosisRecord> = new Map();
  private staged: Map<string, DiagnosisRecord> = new Map();

  constructor(records: DiagnosisRecord[] = []) {
    for (const record of records) {
      this.committed.set(recordKey(record.code, record.versionTag), record);
    }
  }

  async find(code: string, versionTag: string): Promise<DiagnosisRecord | undefined> {
    const key = recordKey(code, versionTag);
    return this.staged.get(key) ?? this.committed.get(key);
  }

  async stageCreate(record: DiagnosisRecord): Promise<void> {
    const key = recordKey(record.code, record.versionTag);
    if (this.staged.has(key) || this.committed.has(key)) {
      throw new RepositoryError('stage', `Diagnosis ${record.code} already exists for ${record.versionTag}`);
    }
    this.staged.set(key, record);
  }

  async commit(): Promise<void> {
    for (const [key, record] of this.staged) {
      this.committed.set(key, record);
    }
    this.staged.clear();
  }

  async rollback(): Promise<void> {
    this.staged.clear();
  }

  /**
   * Committed records, optionally limited to one version tag
   */
  list(versionTag?: string): DiagnosisRecord[] {
    return Array.from(this.committed.values()).filter(record => versionTag === undefined || record.versionTag === versionTag);
  }

  get stagedCount(): number {
    return this.staged.size;
  }
}
