import fs from 'fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { CatalogInspection, CatalogNode } from '../types/catalog-types.js';
import { MalformedCatalogError, describeError } from '../types/import-errors.js';
import { ICD10_ROOT_TAGS, ICD10_XML_ELEMENTS } from '../constants/icd10-constants.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface CatalogFileReaderConfig {
  verbose: boolean;
}

// Shape of one entry in fast-xml-parser's preserveOrder output
type OrderedEntry = Record<string, unknown>;

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isOrderedEntry(value: unknown): value is OrderedEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEntries(value: unknown): OrderedEntry[] {
  return Array.isArray(value) ? value.filter(isOrderedEntry) : [];
}

function elementName(entry: OrderedEntry): string | undefined {
  return Object.keys(entry).find(key => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
}

function textOf(entries: OrderedEntry[]): string {
  let text = '';
  for (const entry of entries) {
    const value = entry[TEXT_KEY];
    if (typeof value === 'string' || typeof value === 'number') {
      text += String(value);
    }
  }
  return text;
}

/**
 * Text of the first direct child element with the given name, or undefined when there is none
 */
function fieldText(entries: OrderedEntry[], field: string): string | undefined {
  const entry = entries.find(candidate => elementName(candidate) === field);
  return entry ? textOf(toEntries(entry[field])) : undefined;
}

export class CatalogFileReader {
  private config: CatalogFileReaderConfig;
  private parser: XMLParser;

  constructor(config: CatalogFileReaderConfig) {
    this.config = config;
    this.parser = new XMLParser({
      preserveOrder: true,
      ignoreAttributes: true,
      ignoreDeclaration: true,
      ignorePiTags: true,
      parseTagValue: false,
      trimValues: false,
      // decodes numeric and hex character references as well as named ones
      htmlEntities: true
    });
  }

  /**
   * Read and parse a catalog document into a CatalogNode tree
   */
  readCatalog(filePath: string): CatalogNode {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new MalformedCatalogError(filePath, `unable to read file: ${describeError(error)}`, { cause: error });
    }

    if (this.config.verbose) {
      console.debug(`${LogPrefixes.CATALOG} Read ${content.length} characters from ${filePath}`);
    }
    return this.parseCatalog(content, filePath);
  }

  parseCatalog(content: string, source: string): CatalogNode {
    const validation = XMLValidator.validate(content);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new MalformedCatalogError(source, `${msg} (line ${line}, column ${col})`);
    }

    let parsed: unknown;
    try {
      parsed = this.parser.parse(content);
    } catch (error) {
      throw new MalformedCatalogError(source, describeError(error), { cause: error });
    }

    const rootEntry = toEntries(parsed).find(entry => elementName(entry) !== undefined);
    const rootTag = rootEntry ? elementName(rootEntry) : undefined;
    if (!rootEntry || !rootTag) {
      throw new MalformedCatalogError(source, 'document has no root element');
    }

    return {
      kind: 'catalog',
      label: rootTag,
      children: this.buildNodes([rootEntry])
    };
  }

  /**
   * Report whether a file looks like an ICD-10 catalog without importing it
   */
  inspectCatalog(filePath: string): CatalogInspection {
    try {
      const root = this.readCatalog(filePath);
      const chapterCount = countNodes(root, 'chapter');
      const rootTag = root.label;
      return {
        filePath,
        valid: true,
        recognized: (rootTag !== undefined && ICD10_ROOT_TAGS.includes(rootTag)) || chapterCount > 0,
        rootTag,
        chapterCount,
        diagnosisCount: countNodes(root, 'diagnosis')
      };
    } catch (error) {
      if (!(error instanceof MalformedCatalogError)) {
        throw error;
      }
      return {
        filePath,
        valid: false,
        recognized: false,
        chapterCount: 0,
        diagnosisCount: 0,
        error: error.message
      };
    }
  }

  /**
   * Convert ordered XML entries into catalog nodes. Elements that are not chapters,
   * sections or diagnoses are dropped, but catalog elements nested inside them are
   * kept in document order.
   */
  private buildNodes(entries: OrderedEntry[]): CatalogNode[] {
    const nodes: CatalogNode[] = [];

    for (const entry of entries) {
      const name = elementName(entry);
      if (name === undefined) {
        continue;
      }
      const children = toEntries(entry[name]);

      switch (name) {
        case ICD10_XML_ELEMENTS.CHAPTER:
          nodes.push({
            kind: 'chapter',
            label: fieldText(children, ICD10_XML_ELEMENTS.DESCRIPTION),
            children: this.buildNodes(children)
          });
          break;
        case ICD10_XML_ELEMENTS.SECTION:
          nodes.push({
            kind: 'section',
            label: fieldText(children, ICD10_XML_ELEMENTS.DESCRIPTION),
            children: this.buildNodes(children)
          });
          break;
        case ICD10_XML_ELEMENTS.DIAGNOSIS:
          nodes.push({
            kind: 'diagnosis',
            code: fieldText(children, ICD10_XML_ELEMENTS.CODE),
            label: fieldText(children, ICD10_XML_ELEMENTS.DESCRIPTION),
            children: this.buildNodes(children)
          });
          break;
        default:
          nodes.push(...this.buildNodes(children));
      }
    }

    return nodes;
  }
}

export function countNodes(node: CatalogNode, kind: CatalogNode['kind']): number {
  let count = node.kind === kind ? 1 : 0;
  for (const child of node.children) {
    count += countNodes(child, kind);
  }
  return count;
}
