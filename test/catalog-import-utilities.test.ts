import path from 'path';
import { CatalogImportUtilities, isFailure, settleActiveOperations } from '../src/catalog-import-utilities';
import { FileHandler, isCatalogFileName } from '../src/base/file-handler';
import { InMemoryDiagnosisRepository } from '../src/repositories/in-memory-diagnosis-repository';
import { ConfigurationError } from '../src/types/import-errors';
import { CatalogImportOptions, validateImportConfig } from '../src/types/import-config';

const catalogsDir = path.join(__dirname, 'fixtures', 'catalogs');

function options(overrides: Partial<CatalogImportOptions> = {}): CatalogImportOptions {
  return {
    documentPaths: [catalogsDir],
    versionTag: 'icd10',
    batchSize: 100,
    fhirUrl: 'http://localhost:8080/fhir',
    dryRun: false,
    verbose: false,
    ...overrides
  };
}

describe('CatalogImportUtilities', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('importCatalogs', () => {
    it('should import every catalog found in a directory, one run each', async () => {
      const repository = new InMemoryDiagnosisRepository();
      const utilities = new CatalogImportUtilities(options());

      const results = await utilities.importCatalogs(repository);

      expect(results).toEqual([
        { kind: 'success', document: path.join(catalogsDir, 'icd10cm-tabular-2025.xml'), created: 2, skipped: 0, excluded: 0 },
        { kind: 'success', document: path.join(catalogsDir, 'nested', 'ICD10-extra.xml'), created: 2, skipped: 2, excluded: 0 }
      ]);
      expect(results.some(isFailure)).toBe(false);
      expect(repository.list('icd10')).toHaveLength(4);
    });

    it('should reject invalid options before importing anything', async () => {
      const repository = new InMemoryDiagnosisRepository();
      const utilities = new CatalogImportUtilities(options({ versionTag: 'icd9', batchSize: 0 }));

      await expect(utilities.importCatalogs(repository)).rejects.toThrow(ConfigurationError);
      expect(repository.list()).toEqual([]);
    });

    it('should require a FHIR URL when no repository is given', async () => {
      const utilities = new CatalogImportUtilities(options({ fhirUrl: ' ' }));

      await expect(utilities.importCatalogs()).rejects.toMatchObject({
        problems: ['a FHIR server URL is required']
      });
    });

    it('should report a path that does not exist as a parse failure', async () => {
      const utilities = new CatalogImportUtilities(options({ documentPaths: [path.join(catalogsDir, 'nested', 'does-not-exist.xml')] }));
      const repository = new InMemoryDiagnosisRepository();

      const results = await utilities.importCatalogs(repository);

      expect(results).toEqual([
        expect.objectContaining({ kind: 'parse-failure' })
      ]);
    });
  });

  describe('inspectCatalog', () => {
    it('should report chapter and diagnosis counts', () => {
      const utilities = new CatalogImportUtilities(options());
      const inspection = utilities.inspectCatalog(path.join(catalogsDir, 'icd10cm-tabular-2025.xml'));

      expect(inspection).toMatchObject({ valid: true, recognized: true, chapterCount: 1, diagnosisCount: 2 });
    });
  });
});

describe('FileHandler', () => {
  const fileHandler = new FileHandler({ verbose: false });

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should find ICD XML files recursively', () => {
    expect(fileHandler.findCatalogFiles(catalogsDir)).toEqual([
      path.join(catalogsDir, 'icd10cm-tabular-2025.xml'),
      path.join(catalogsDir, 'nested', 'ICD10-extra.xml')
    ]);
  });

  it('should return nothing for a path that is not a directory', () => {
    expect(fileHandler.findCatalogFiles(path.join(catalogsDir, 'readme.xml'))).toEqual([]);
  });

  it('should keep files and make relative paths absolute', () => {
    const relative = path.relative(process.cwd(), path.join(catalogsDir, 'readme.xml'));
    expect(fileHandler.resolveDocumentPaths([relative])).toEqual([path.join(catalogsDir, 'readme.xml')]);
  });

  it('should skip ICD-named files that are malformed or not catalogs', () => {
    const broken = path.join(catalogsDir, 'icd10-broken.xml');
    const glossary = path.join(catalogsDir, 'icd10-glossary.xml');

    const files = fileHandler.findCatalogFiles(catalogsDir);

    expect(files).not.toContain(broken);
    expect(files).not.toContain(glossary);
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^\[DISCOVERY\] Skipping .*icd10-broken\.xml: Malformed catalog /));
    expect(console.warn).toHaveBeenCalledWith(`[DISCOVERY] Skipping ${glossary}: not an ICD-10 catalog`);
  });

  it('should match catalog file names', () => {
    expect(isCatalogFileName('ICD10CM_tabular.XML')).toBe(true);
    expect(isCatalogFileName('icd10-notes.txt')).toBe(false);
    expect(isCatalogFileName('readme.xml')).toBe(false);
  });
});

describe('validateImportConfig', () => {
  it('should accept the defaults', () => {
    expect(validateImportConfig({ documentPaths: ['icd10.xml'], versionTag: 'icd10', batchSize: 100 })).toEqual([]);
  });

  it('should list every problem', () => {
    expect(validateImportConfig({ documentPaths: [], versionTag: 'icd9', batchSize: 2.5 })).toEqual([
      'at least one catalog path is required',
      'batch size must be a positive integer, got 2.5',
      'unknown version tag "icd9", expected one of: icd10, icd10cm'
    ]);
  });
});

describe('settleActiveOperations', () => {
  it('should resolve 0 once every operation has finished', async () => {
    await expect(settleActiveOperations([Promise.resolve([]), Promise.resolve('done')])).resolves.toBe(0);
  });

  it('should resolve 1 when an operation rejected', async () => {
    await expect(settleActiveOperations([Promise.resolve([]), Promise.reject(new Error('boom'))])).resolves.toBe(1);
  });

  it('should resolve 0 with nothing in flight', async () => {
    await expect(settleActiveOperations(new Set<Promise<unknown>>())).resolves.toBe(0);
  });
});
