import { FileHandler } from './base/file-handler.js';
import { FhirClient } from './base/fhir-client.js';
import { CatalogFileReader } from './readers/catalog-file-reader.js';
import { CatalogImportEngine, ImportResult } from './import/catalog-import-engine.js';
import { FhirDiagnosisRepository } from './repositories/fhir-diagnosis-repository.js';
import type { DiagnosisRepository } from './repositories/diagnosis-repository.js';
import { ConsoleProgressSink } from './progress/console-progress-sink.js';
import type { ProgressSink } from './progress/progress-sink.js';
import type { CatalogInspection } from './types/catalog-types.js';
import { CatalogImportOptions, validateImportConfig } from './types/import-config.js';
import { ConfigurationError } from './types/import-errors.js';
import { LogPrefixes } from './constants/log-prefixes.js';

export class CatalogImportUtilities {
  private options: CatalogImportOptions;
  private fileHandler: FileHandler;
  private reader: CatalogFileReader;

  constructor(options: CatalogImportOptions) {
    this.options = options;
    this.fileHandler = new FileHandler({ verbose: options.verbose });
    this.reader = new CatalogFileReader({ verbose: options.verbose });
  }

  /**
   * Validate options, expand directories and import every catalog in order.
   * The repository and sink default to the FHIR server and the console.
   */
  async importCatalogs(repository?: DiagnosisRepository, sink?: ProgressSink): Promise<ImportResult[]> {
    const problems = validateImportConfig(this.options);
    if (!repository && this.options.fhirUrl.trim() === '') {
      problems.push('a FHIR server URL is required');
    }
    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    const documentPaths = this.fileHandler.resolveDocumentPaths(this.options.documentPaths);
    if (documentPaths.length === 0) {
      console.warn(`${LogPrefixes.SKIP} No catalog files to import`);
      return [];
    }

    if (this.options.dryRun) {
      console.log(`${LogPrefixes.DRY_RUN} Dry run enabled. No records will be written.`);
    }

    const engine = new CatalogImportEngine(
      {
        versionTag: this.options.versionTag,
        batchSize: this.options.batchSize,
        verbose: this.options.verbose
      },
      repository ?? this.createFhirRepository(),
      sink ?? new ConsoleProgressSink(this.options.verbose),
      this.reader
    );

    const results = await engine.importDocuments(documentPaths);
    printImportSummary(results);
    return results;
  }

  inspectCatalog(filePath: string): CatalogInspection {
    return this.reader.inspectCatalog(filePath);
  }

  findCatalogFiles(dirPath: string): string[] {
    return this.fileHandler.findCatalogFiles(dirPath);
  }

  private createFhirRepository(): FhirDiagnosisRepository {
    const fhirClient = new FhirClient({
      dryRun: this.options.dryRun,
      verbose: this.options.verbose
    });
    return new FhirDiagnosisRepository(fhirClient, this.options.fhirUrl);
  }
}

export function isFailure(result: ImportResult): boolean {
  return result.kind !== 'success';
}

/**
 * Wait for in-flight imports during shutdown. Resolves 1 if any of them rejected, otherwise 0.
 */
export async function settleActiveOperations(operations: Iterable<Promise<unknown>>): Promise<number> {
  const outcomes = await Promise.allSettled(Array.from(operations));
  return outcomes.some(outcome => outcome.status === 'rejected') ? 1 : 0;
}

export function printImportSummary(results: ImportResult[]): void {
  console.info(`\n${LogPrefixes.SUMMARY} Import finished for ${results.length} document(s):`);

  let created = 0;
  let skipped = 0;
  for (const result of results) {
    switch (result.kind) {
      case 'success':
        created += result.created;
        skipped += result.skipped;
        console.info(`   ✓ ${result.document}: ${result.created} created, ${result.skipped} skipped`);
        break;
      case 'parse-failure':
        console.error(`   ✗ ${result.document}: could not be parsed (${result.cause.message})`);
        break;
      case 'repository-failure':
        console.error(`   ✗ ${result.document}: rolled back after ${result.cause.operation} failure (${result.cause.message})`);
        break;
    }
  }

  console.info(`   Total: ${created} created, ${skipped} skipped, ${results.filter(isFailure).length} failed`);
}
