import { ConsoleProgressSink } from '../src/progress/console-progress-sink';

describe('ConsoleProgressSink', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'debug').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print progress with the chapter label', () => {
    new ConsoleProgressSink().progress({ document: 'icd10.xml', categoryLabel: 'Neoplasms (C00-D49)', createdCount: 200 });
    expect(console.info).toHaveBeenCalledWith('[PROGRESS] Neoplasms (C00-D49): staged 200 records...');
  });

  it('should name entries without a chapter', () => {
    new ConsoleProgressSink().chapterStarted('icd10.xml', '');
    expect(console.info).toHaveBeenCalledWith('[IMPORT] Processing: (no chapter)');
  });

  it('should print excluded entries only when verbose', () => {
    const summary = { document: 'icd10.xml', createdCount: 3, skippedCount: 1, excludedCount: 2 };

    new ConsoleProgressSink(false).summary(summary);
    expect(console.info).toHaveBeenCalledWith('[SUMMARY] icd10.xml: 3 created, 1 skipped');
    expect(console.debug).not.toHaveBeenCalled();

    new ConsoleProgressSink(true).summary(summary);
    expect(console.debug).toHaveBeenCalledWith('[SUMMARY] icd10.xml: 2 incomplete entries excluded');
  });

  it('should print failures as errors', () => {
    new ConsoleProgressSink().failed('icd10.xml', 'rolled-back', new Error('commit failed'));
    expect(console.error).toHaveBeenCalledWith('[ROLLBACK] icd10.xml rolled-back: commit failed');
  });
});
