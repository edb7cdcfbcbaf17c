import { getCodingStandard, getSupportedVersionTags } from '../constants/coding-standard-registry.js';

export interface ImportConfig {
  documentPaths: string[];
  versionTag: string;
  batchSize: number;
}

export interface CatalogImportOptions extends ImportConfig {
  fhirUrl: string;
  dryRun: boolean;
  verbose: boolean;
}

/**
 * Collect every problem with an import configuration; empty when it is usable
 */
export function validateImportConfig(config: ImportConfig): string[] {
  const problems: string[] = [];

  if (config.documentPaths.length === 0) {
    problems.push('at least one catalog path is required');
  }
  if (config.documentPaths.some(documentPath => documentPath.trim() === '')) {
    problems.push('catalog paths must not be empty');
  }
  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    problems.push(`batch size must be a positive integer, got ${config.batchSize}`);
  }
  if (!getCodingStandard(config.versionTag)) {
    problems.push(`unknown version tag "${config.versionTag}", expected one of: ${getSupportedVersionTags().join(', ')}`);
  }

  return problems;
}
