import type { DiagnosisRepository } from '../repositories/diagnosis-repository.js';
import type { ProgressSink } from '../progress/progress-sink.js';
import type { CatalogNode } from '../types/catalog-types.js';
import { CatalogFileReader } from '../readers/catalog-file-reader.js';
import { normalizeEntries } from './entry-normalizer.js';
import { DiagnosisDeduplicator } from './diagnosis-deduplicator.js';
import { BatchCommitter } from './batch-committer.js';
import { MalformedCatalogError, RepositoryError } from '../types/import-errors.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface CatalogImportEngineConfig {
  versionTag: string;
  batchSize: number;
  verbose: boolean;
}

export type ImportResult =
  | { kind: 'success'; document: string; created: number; skipped: number; excluded: number }
  | { kind: 'parse-failure'; document: string; cause: MalformedCatalogError }
  | { kind: 'repository-failure'; document: string; cause: RepositoryError };

/**
 * Runs the read → normalize → dedup → commit pipeline, one document at a time
 */
export class CatalogImportEngine {
  private config: CatalogImportEngineConfig;
  private repository: DiagnosisRepository;
  private reader: CatalogFileReader;
  private sink: ProgressSink;

  constructor(config: CatalogImportEngineConfig, repository: DiagnosisRepository, sink: ProgressSink, reader?: CatalogFileReader) {
    this.config = config;
    this.repository = repository;
    this.sink = sink;
    this.reader = reader ?? new CatalogFileReader({ verbose: config.verbose });
  }

  /**
   * Import each document in order. Every document gets its own run, so a failure
   * never undoes a document committed before it.
   */
  async importDocuments(documentPaths: string[]): Promise<ImportResult[]> {
    const results: ImportResult[] = [];
    for (const documentPath of documentPaths) {
      results.push(await this.importDocument(documentPath));
    }
    return results;
  }

  async importDocument(documentPath: string): Promise<ImportResult> {
    console.info(`${LogPrefixes.IMPORT} Starting import of ${documentPath} (${this.config.versionTag})`);
    const committer = new BatchCommitter(documentPath, this.repository, this.sink, {
      batchSize: this.config.batchSize,
      verbose: this.config.verbose
    });

    try {
      const root = this.reader.readCatalog(documentPath);
      await this.processCatalog(root, committer);
      const summary = await committer.commit();
      return {
        kind: 'success',
        document: documentPath,
        created: summary.createdCount,
        skipped: summary.skippedCount,
        excluded: summary.excludedCount
      };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (committer.run.status === 'in-progress') {
        await committer.rollback(cause);
      }

      if (error instanceof MalformedCatalogError) {
        return { kind: 'parse-failure', document: documentPath, cause: error };
      }
      if (error instanceof RepositoryError) {
        return { kind: 'repository-failure', document: documentPath, cause: error };
      }
      throw error;
    }
  }

  private async processCatalog(root: CatalogNode, committer: BatchCommitter): Promise<void> {
    const deduplicator = new DiagnosisDeduplicator(this.repository, this.config.versionTag);
    const candidates = normalizeEntries(root, (node, category) => {
      committer.recordExcluded();
      if (this.config.verbose) {
        console.debug(`${LogPrefixes.SKIP} Incomplete diagnosis entry in "${category}" (code: ${node.code ?? 'missing'}, description: ${node.label ?? 'missing'})`);
      }
    });

    for (const candidate of candidates) {
      committer.observe(candidate);
      const decision = await deduplicator.decide(candidate);
      if (decision.action === 'create') {
        await committer.stage(decision.record);
      } else {
        committer.recordSkip();
        if (this.config.verbose) {
          console.debug(`${LogPrefixes.SKIP} ${candidate.code} already exists`);
        }
      }
    }
  }
}
