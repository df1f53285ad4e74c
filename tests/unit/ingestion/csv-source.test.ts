/**
 * Unit tests for the CSV source
 */

import { PassThrough, Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { openProjectionCsv, openProjectionCsvFile, type SourceRow } from '@/modules/ingestion/index.js';

const csv = (content: string): Readable => Readable.from([content]);

const collect = async (rows: AsyncIterable<SourceRow>): Promise<SourceRow[]> => {
  const collected: SourceRow[] = [];
  for await (const row of rows) collected.push(row);
  return collected;
};

describe('openProjectionCsv', () => {
  it('maps columns by header name, ignoring order, extra columns and empty lines', async () => {
    const rows = await openProjectionCsv(
      csv(
        'value,unit,note,variable,item,year,region\n' +
          '1500,ha,checked,area,wht,2020,usa\n' +
          '\n' +
          '2,1000 ha,,land,grs,2030,bra\n'
      )
    );

    expect(await collect(rows._unsafeUnwrap())).toEqual([
      {
        index: 1,
        record: { region: 'usa', year: '2020', item: 'wht', variable: 'area', unit: 'ha', value: '1500' },
      },
      {
        index: 2,
        record: { region: 'bra', year: '2030', item: 'grs', variable: 'land', unit: '1000 ha', value: '2' },
      },
    ]);
  });

  it('trims cells and matches header names case-insensitively', async () => {
    const rows = await openProjectionCsv(
      csv('Region, Year ,ITEM,Variable,Unit,Value\n usa , 2020 ,wht,area,ha, 7.5 \n')
    );

    expect(await collect(rows._unsafeUnwrap())).toEqual([
      {
        index: 1,
        record: { region: 'usa', year: '2020', item: 'wht', variable: 'area', unit: 'ha', value: '7.5' },
      },
    ]);
  });

  it('strips a byte order mark', async () => {
    const rows = await openProjectionCsv(
      csv('\uFEFFregion,year,item,variable,unit,value\nusa,2020,wht,area,ha,1\n')
    );

    expect((await collect(rows._unsafeUnwrap()))[0]?.record.region).toBe('usa');
  });

  it('fills cells missing from a short row with empty strings', async () => {
    const rows = await openProjectionCsv(csv('region,year,item,variable,unit,value\nusa,2020,wht\n'));

    expect(await collect(rows._unsafeUnwrap())).toEqual([
      {
        index: 1,
        record: { region: 'usa', year: '2020', item: 'wht', variable: '', unit: '', value: '' },
      },
    ]);
  });

  it('fails with InvalidHeaderError when a column is missing', async () => {
    const result = await openProjectionCsv(csv('region,year,item,variable,value\nusa,2020,wht,area,1\n'));

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InvalidHeaderError',
      message: 'Source header is missing required columns: unit',
      missingColumns: ['unit'],
    });
  });

  it('fails with InvalidHeaderError on an empty source', async () => {
    const result = await openProjectionCsv(csv(''));

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('InvalidHeaderError');
  });

  it('surfaces malformed CSV while iterating', async () => {
    const input = new PassThrough();
    input.write('region,year,item,variable,unit,value\n');
    const rows = await openProjectionCsv(input);

    input.end('usa,"2020,wht,area,ha,1\n');

    await expect(collect(rows._unsafeUnwrap())).rejects.toThrow();
  });
});

describe('openProjectionCsvFile', () => {
  it('fails with SourceReadError when the file cannot be read', async () => {
    const result = await openProjectionCsvFile('/nonexistent/globiom.csv');

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('SourceReadError');
    expect(error.message).toBe('Cannot read CSV file at /nonexistent/globiom.csv');
  });
});
