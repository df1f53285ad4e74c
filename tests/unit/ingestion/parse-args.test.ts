import { describe, expect, it } from 'vitest';

import { parseIngestArgs } from '@/modules/ingestion/index.js';

describe('parseIngestArgs', () => {
  it('parses a minimal invocation', () => {
    expect(parseIngestArgs(['--csv', 'data/run.csv'])._unsafeUnwrap()).toEqual({
      csvPath: 'data/run.csv',
      modules: [],
      clear: false,
      batchSize: undefined,
    });
  });

  it('parses every option', () => {
    const result = parseIngestArgs([
      '--module',
      'crop',
      '--csv',
      'run.csv',
      '--module',
      'landcover',
      '--module',
      'crop',
      '--clear',
      '--batch-size',
      '250',
    ]);

    expect(result._unsafeUnwrap()).toEqual({
      csvPath: 'run.csv',
      modules: ['crop', 'landcover'],
      clear: true,
      batchSize: 250,
    });
  });

  const invalid: [args: string[], message: string][] = [
    [[], '--csv is required'],
    [['--csv'], '--csv needs a file path'],
    [['--csv', 'a.csv', '--module', 'forestry'], '--module must be one of crop, animal, bioenergy, landcover'],
    [['--csv', 'a.csv', '--batch-size', '0'], '--batch-size must be a positive integer'],
    [['--csv', 'a.csv', '--batch-size', '1.5'], '--batch-size must be a positive integer'],
    [['--csv', 'a.csv', '--batch-size', '9363'], '--batch-size must be at most 9362'],
    [['--csv', 'a.csv', '--dry-run'], "Unknown argument '--dry-run'"],
  ];

  it.each(invalid)('rejects %j', (args, message) => {
    expect(parseIngestArgs(args)._unsafeUnwrapErr()).toBe(message);
  });
});
