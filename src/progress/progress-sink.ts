import type { ImportRunStatus } from '../types/diagnosis-types.js';

export interface ProgressNotification {
  document: string;
  categoryLabel: string;
  createdCount: number;
}

export interface RunSummary {
  document: string;
  createdCount: number;
  skippedCount: number;
  excludedCount: number;
}

/**
 * Receives ordered notifications from an import run
 */
export interface ProgressSink {
  progress(notification: ProgressNotification): void;

  summary(summary: RunSummary): void;

  chapterStarted?(document: string, categoryLabel: string): void;

  failed?(document: string, status: ImportRunStatus, cause: Error): void;
}
