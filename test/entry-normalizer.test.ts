import path from 'path';
import { CatalogFileReader } from '../src/readers/catalog-file-reader';
import { normalizeEntries } from '../src/import/entry-normalizer';
import type { CatalogNode } from '../src/types/catalog-types';

describe('normalizeEntries', () => {
  const reader = new CatalogFileReader({ verbose: false });

  it('should take the category from the chapter, not the section', () => {
    const root = reader.readCatalog(path.join(__dirname, 'fixtures', 'icd10-sample.xml'));

    expect(Array.from(normalizeEntries(root))).toEqual([
      { code: 'A00', description: 'Cholera', category: 'Certain infectious diseases (A00-B99)' },
      { code: 'A00.0', description: 'Cholera due to Vibrio cholerae 01, biovar cholerae', category: 'Certain infectious diseases (A00-B99)' },
      { code: 'A00.1', description: 'Cholera due to Vibrio cholerae 01, biovar eltor', category: 'Certain infectious diseases (A00-B99)' },
      { code: 'C00', description: 'Malignant neoplasm of lip & mouth', category: 'Neoplasms (C00-D49)' }
    ]);
  });

  it('should exclude entries with a missing or blank code or description', () => {
    const root = reader.readCatalog(path.join(__dirname, 'fixtures', 'icd10-incomplete.xml'));
    const excluded: Array<string | undefined> = [];

    const candidates = Array.from(normalizeEntries(root, node => excluded.push(node.code)));

    expect(candidates).toEqual([
      { code: 'A02.0', description: 'Salmonella enteritis', category: 'Certain infectious diseases (A00-B99)' }
    ]);
    expect(excluded).toEqual([undefined, '   ', 'A01.0', 'A01.1']);
  });

  it('should use an empty category when a diagnosis has no enclosing chapter', () => {
    const root: CatalogNode = {
      kind: 'catalog',
      label: 'root',
      children: [
        { kind: 'section', label: 'Loose section', children: [{ kind: 'diagnosis', code: 'Z00', label: 'General exam', children: [] }] }
      ]
    };

    expect(Array.from(normalizeEntries(root))).toEqual([
      { code: 'Z00', description: 'General exam', category: '' }
    ]);
  });

  it('should still visit diagnoses nested under an excluded parent', () => {
    const root: CatalogNode = {
      kind: 'chapter',
      label: ' Chapter ',
      children: [
        { kind: 'diagnosis', label: 'Parent without code', children: [{ kind: 'diagnosis', code: 'B01', label: 'Child', children: [] }] }
      ]
    };

    expect(Array.from(normalizeEntries(root))).toEqual([
      { code: 'B01', description: 'Child', category: 'Chapter' }
    ]);
  });

  it('should be lazy', () => {
    const root = reader.readCatalog(path.join(__dirname, 'fixtures', 'icd10-sample.xml'));
    const iterator = normalizeEntries(root);

    expect(iterator.next().value).toEqual({ code: 'A00', description: 'Cholera', category: 'Certain infectious diseases (A00-B99)' });
    expect(iterator.next().value?.code).toBe('A00.0');
  });
});
