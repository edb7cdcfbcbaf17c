import type { ProgressNotification, ProgressSink, RunSummary } from './progress-sink.js';
import type { ImportRunStatus } from '../types/diagnosis-types.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export class ConsoleProgressSink implements ProgressSink {
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  progress(notification: ProgressNotification): void {
    console.info(`${LogPrefixes.PROGRESS} ${notification.categoryLabel || '(no chapter)'}: staged ${notification.createdCount} records...`);
  }

  summary(summary: RunSummary): void {
    console.info(`${LogPrefixes.SUMMARY} ${summary.document}: ${summary.createdCount} created, ${summary.skippedCount} skipped`);
    if (this.verbose && summary.excludedCount > 0) {
      console.debug(`${LogPrefixes.SUMMARY} ${summary.document}: ${summary.excludedCount} incomplete entries excluded`);
    }
  }

  chapterStarted(document: string, categoryLabel: string): void {
    console.info(`${LogPrefixes.IMPORT} Processing: ${categoryLabel || '(no chapter)'}`);
  }

  failed(document: string, status: ImportRunStatus, cause: Error): void {
    console.error(`${LogPrefixes.ROLLBACK} ${document} ${status}: ${cause.message}`);
  }
}
