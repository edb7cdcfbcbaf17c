import fs from 'fs';
import path from 'path';
import { LogPrefixes } from '../constants/log-prefixes.js';
import { CatalogFileReader } from '../readers/catalog-file-reader.js';

export interface FileHandlerConfig {
  verbose: boolean;
}

export class FileHandler {
  protected config: FileHandlerConfig;
  private reader: CatalogFileReader;

  constructor(config: FileHandlerConfig) {
    this.config = config;
    this.reader = new CatalogFileReader({ verbose: config.verbose });
  }

  /**
   * Check if a path exists and is a directory
   */
  isDirectory(dirPath: string): boolean {
    if (!fs.existsSync(dirPath)) {
      return false;
    }

    const stats = fs.statSync(dirPath);
    return stats.isDirectory();
  }

  /**
   * Recursively find XML files whose name mentions ICD, sorted by path. Files that are
   * not well-formed or do not look like an ICD-10 catalog are skipped.
   */
  findCatalogFiles(dirPath: string): string[] {
    if (!this.isDirectory(dirPath)) {
      return [];
    }

    const found: string[] = [];
    for (const entry of fs.readdirSync(dirPath, { withFileTypes: true })) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        found.push(...this.findCatalogFiles(entryPath));
      } else if (entry.isFile() && isCatalogFileName(entry.name) && this.isImportableCatalog(entryPath)) {
        found.push(entryPath);
      }
    }

    return found.sort();
  }

  private isImportableCatalog(filePath: string): boolean {
    const inspection = this.reader.inspectCatalog(filePath);
    if (!inspection.valid) {
      console.warn(`${LogPrefixes.DISCOVERY} Skipping ${filePath}: ${inspection.error}`);
      return false;
    }
    if (!inspection.recognized) {
      console.warn(`${LogPrefixes.DISCOVERY} Skipping ${filePath}: not an ICD-10 catalog`);
      return false;
    }
    return true;
  }

  /**
   * Expand directories into the catalog files beneath them; files are kept as given
   */
  resolveDocumentPaths(inputPaths: string[]): string[] {
    const resolved: string[] = [];

    for (const inputPath of inputPaths) {
      const absolutePath = path.isAbsolute(inputPath) ? inputPath : path.join(process.cwd(), inputPath);
      if (this.isDirectory(absolutePath)) {
        const files = this.findCatalogFiles(absolutePath);
        console.info(`${LogPrefixes.DISCOVERY} Found ${files.length} catalog files in ${absolutePath}`);
        if (this.config.verbose) {
          files.forEach(file => console.debug(`${LogPrefixes.DISCOVERY}   ${file}`));
        }
        resolved.push(...files);
      } else {
        resolved.push(absolutePath);
      }
    }

    return resolved;
  }
}

export function isCatalogFileName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith('.xml') && lower.includes('icd');
}
