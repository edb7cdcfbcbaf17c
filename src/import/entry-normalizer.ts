import type { CatalogNode } from '../types/catalog-types.js';
import type { DiagnosisCandidate } from '../types/diagnosis-types.js';

export type IncompleteEntryHandler = (node: CatalogNode, category: string) => void;

/**
 * Walk a catalog depth-first and yield one candidate per complete diagnosis.
 *
 * The category is the label of the nearest enclosing chapter; sections only group
 * entries and never change it. Diagnoses whose code or description is missing or
 * blank are passed to `onIncompleteEntry` and left out.
 */
export function* normalizeEntries(root: CatalogNode, onIncompleteEntry?: IncompleteEntryHandler): Generator<DiagnosisCandidate> {
  yield* visit(root, '', onIncompleteEntry);
}

function* visit(node: CatalogNode, category: string, onIncompleteEntry?: IncompleteEntryHandler): Generator<DiagnosisCandidate> {
  let childCategory = category;

  if (node.kind === 'chapter') {
    childCategory = node.label?.trim() ?? '';
  } else if (node.kind === 'diagnosis') {
    const code = node.code?.trim() ?? '';
    const description = node.label?.trim() ?? '';
    if (code && description) {
      yield { code, description, category };
    } else if (onIncompleteEntry) {
      onIncompleteEntry(node, category);
    }
  }

  for (const child of node.children) {
    yield* visit(child, childCategory, onIncompleteEntry);
  }
}
