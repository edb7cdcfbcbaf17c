import type { DiagnosisRepository } from '../repositories/diagnosis-repository.js';
import type { ProgressSink, RunSummary } from '../progress/progress-sink.js';
import type { DiagnosisCandidate, DiagnosisRecord, ImportRun } from '../types/diagnosis-types.js';
import { describeError, toRepositoryError } from '../types/import-errors.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface BatchCommitterConfig {
  batchSize: number;
  verbose: boolean;
}

/**
 * Owns the ImportRun for one document and the repository transaction behind it.
 * Either every staged create is committed or none of them is.
 */
export class BatchCommitter {
  readonly run: ImportRun;
  private repository: DiagnosisRepository;
  private sink: ProgressSink;
  private config: BatchCommitterConfig;
  private chapterSeen: boolean = false;

  constructor(document: string, repository: DiagnosisRepository, sink: ProgressSink, config: BatchCommitterConfig) {
    this.repository = repository;
    this.sink = sink;
    this.config = config;
    this.run = {
      document,
      totalCandidates: 0,
      created: 0,
      skipped: 0,
      excluded: 0,
      currentCategory: '',
      status: 'in-progress'
    };
  }

  observe(candidate: DiagnosisCandidate): void {
    this.assertInProgress();
    this.run.totalCandidates++;

    if (!this.chapterSeen || candidate.category !== this.run.currentCategory) {
      this.chapterSeen = true;
      this.run.currentCategory = candidate.category;
      this.sink.chapterStarted?.(this.run.document, candidate.category);
    }
  }

  async stage(record: DiagnosisRecord): Promise<void> {
    this.assertInProgress();
    try {
      await this.repository.stageCreate(record);
    } catch (error) {
      throw toRepositoryError(error, 'stage');
    }
    this.run.created++;

    if (this.run.created % this.config.batchSize === 0) {
      this.sink.progress({
        document: this.run.document,
        categoryLabel: this.run.currentCategory,
        createdCount: this.run.created
      });
    }
  }

  recordSkip(): void {
    this.assertInProgress();
    this.run.skipped++;
  }

  recordExcluded(): void {
    this.assertInProgress();
    this.run.excluded++;
  }

  async commit(): Promise<RunSummary> {
    this.assertInProgress();
    try {
      await this.repository.commit();
    } catch (error) {
      throw toRepositoryError(error, 'commit');
    }
    this.run.status = 'committed';
    console.info(`${LogPrefixes.COMMIT} Committed ${this.run.created} records from ${this.run.document}`);

    const summary: RunSummary = {
      document: this.run.document,
      createdCount: this.run.created,
      skippedCount: this.run.skipped,
      excludedCount: this.run.excluded
    };
    this.sink.summary(summary);
    return summary;
  }

  /**
   * Discard every create staged in this run. A failing rollback is logged but
   * never replaces the error that caused it.
   */
  async rollback(cause: Error): Promise<void> {
    this.assertInProgress();
    this.run.status = 'rolled-back';
    try {
      await this.repository.rollback();
      if (this.config.verbose) {
        console.debug(`${LogPrefixes.ROLLBACK} Discarded ${this.run.created} staged records from ${this.run.document}`);
      }
    } catch (error) {
      console.error(`${LogPrefixes.ROLLBACK} Rollback failed for ${this.run.document}: ${describeError(error)}`);
    }
    this.sink.failed?.(this.run.document, this.run.status, cause);
  }

  private assertInProgress(): void {
    if (this.run.status !== 'in-progress') {
      throw new Error(`Import run for ${this.run.document} is already ${this.run.status}`);
    }
  }
}
