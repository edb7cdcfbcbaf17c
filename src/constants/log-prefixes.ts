/**
 * Log message prefixes for the ICD-10 import CLI
 * These constants keep console output consistent across every stage of a run
 */

export const LogPrefixes = {
  // Reading and inspecting catalog documents
  CATALOG: '[CATALOG]',

  // Import process overview
  IMPORT: '[IMPORT]',

  // Batch progress notifications
  PROGRESS: '[PROGRESS]',

  // Transaction outcomes
  COMMIT: '[COMMIT]',
  ROLLBACK: '[ROLLBACK]',

  // Discovery of catalog files in directories
  DISCOVERY: '[DISCOVERY]',

  // Skipped entries and documents
  SKIP: '[SKIP]',

  // Summary operations
  SUMMARY: '[SUMMARY]',

  DRY_RUN: '[DRY RUN]'
} as const;
