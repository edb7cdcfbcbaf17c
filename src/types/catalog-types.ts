export type CatalogNodeKind = 'catalog' | 'chapter' | 'section' | 'diagnosis';

/**
 * One element of a parsed catalog document. The root node has kind `catalog`
 * and carries the document's root element name as its label.
 */
export interface CatalogNode {
  readonly kind: CatalogNodeKind;
  readonly label?: string;
  /** Only set on diagnosis nodes that carry a code element. */
  readonly code?: string;
  readonly children: readonly CatalogNode[];
}

export interface CatalogInspection {
  filePath: string;
  valid: boolean;
  recognized: boolean;
  rootTag?: string;
  chapterCount: number;
  diagnosisCount: number;
  error?: string;
}
