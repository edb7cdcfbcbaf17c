import type { DiagnosisRecord } from '../types/diagnosis-types.js';

/**
 * Storage capability the import engine depends on. Creates are buffered until
 * `commit`; `rollback` discards everything staged since the last commit.
 * `find` must also see records staged in the current transaction.
 */
export interface DiagnosisRepository {
  find(code: string, versionTag: string): Promise<DiagnosisRecord | undefined>;

  stageCreate(record: DiagnosisRecord): Promise<void>;

  commit(): Promise<void>;

  rollback(): Promise<void>;
}

export function recordKey(code: string, versionTag: string): string {
  return `${versionTag}|${code}`;
}
