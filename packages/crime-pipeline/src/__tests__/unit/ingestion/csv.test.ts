/**
 * CSV Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { formatCsv, parseCsv } from '../../../ingestion/csv.js';
import { PipelineError } from '../../../core/errors.js';

function parseFailure(content: string): PipelineError {
  try {
    parseCsv(content, { path: 'test.csv' });
  } catch (error) {
    if (error instanceof PipelineError) return error;
    throw error;
  }
  throw new Error('Expected parseCsv to throw');
}

describe('parseCsv', () => {
  it('reads header and rows, inferring numeric columns', () => {
    const table = parseCsv('Crime ID,Crime type,Latitude\nA1,Burglary,53.1\nA2,Theft,-0.5\n');

    expect(table.columns).toEqual(['Crime ID', 'Crime type', 'Latitude']);
    expect(table.rows).toEqual([
      { 'Crime ID': 'A1', 'Crime type': 'Burglary', Latitude: 53.1 },
      { 'Crime ID': 'A2', 'Crime type': 'Theft', Latitude: -0.5 },
    ]);
  });

  it('reads empty fields and NA tokens as null', () => {
    const table = parseCsv('a,b,c\n,NA,x\n');

    expect(table.rows).toEqual([{ a: null, b: null, c: 'x' }]);
  });

  it('keeps text columns as strings even when they look numeric', () => {
    const table = parseCsv('Crime ID,Count\n001,3\n', { textColumns: ['Crime ID'] });

    expect(table.rows).toEqual([{ 'Crime ID': '001', Count: 3 }]);
  });

  it('keeps a column textual when any value is not numeric', () => {
    const table = parseCsv('v\n1\nx\n');

    expect(table.rows).toEqual([{ v: '1' }, { v: 'x' }]);
  });

  it('handles quoted delimiters, doubled quotes and embedded newlines', () => {
    const content =
      'Location,Context\n' +
      '"On or near Bridge Street, Chester","Said ""hello""\nthen left"\n';

    const table = parseCsv(content);

    expect(table.rows).toEqual([
      {
        Location: 'On or near Bridge Street, Chester',
        Context: 'Said "hello"\nthen left',
      },
    ]);
  });

  it('strips a byte order mark and accepts CRLF line endings', () => {
    const table = parseCsv('\uFEFFa,b\r\n1,x\r\n');

    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([{ a: 1, b: 'x' }]);
  });

  it('skips blank lines', () => {
    const table = parseCsv('a\n\n1\n\n2');

    expect(table.rows).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('pads short rows with null', () => {
    const table = parseCsv('a,b,c\n1,2\n');

    expect(table.rows).toEqual([{ a: 1, b: 2, c: null }]);
  });

  it('rejects rows with more fields than the header', () => {
    const error = parseFailure('a,b\n1,2\n3,4,5\n');

    expect(error.kind).toBe('ParseError');
    expect(error.message).toBe('Expected 2 fields in line 3, saw 3');
    expect(error.path).toBe('test.csv');
  });

  it('rejects empty content', () => {
    const error = parseFailure('\n\n');

    expect(error.kind).toBe('ParseError');
    expect(error.message).toBe('No columns to parse from file');
  });

  it('rejects an unterminated quoted field', () => {
    const error = parseFailure('a\n"oops\n');

    expect(error.kind).toBe('ParseError');
    expect(error.message).toBe('Unterminated quoted field starting on line 2');
  });

  it('rejects duplicate header names', () => {
    const error = parseFailure('a,b,a\n1,2,3\n');

    expect(error.message).toBe('Duplicate column name in header: "a"');
  });

  it('returns no rows for a header-only file', () => {
    const table = parseCsv('Crime ID,Outcome type\n');

    expect(table.columns).toEqual(['Crime ID', 'Outcome type']);
    expect(table.rows).toEqual([]);
  });
});

describe('formatCsv', () => {
  it('writes header, values and empty fields for null', () => {
    const csv = formatCsv({
      columns: ['Crime type', 'Count', 'Location Sum'],
      rows: [
        { 'Crime type': 'Theft', Count: 3, 'Location Sum': 50.75 },
        { 'Crime type': null, Count: 1, 'Location Sum': null },
      ],
    });

    expect(csv).toBe('Crime type,Count,Location Sum\nTheft,3,50.75\n,1,\n');
  });

  it('quotes fields containing delimiters, quotes or newlines', () => {
    const csv = formatCsv({
      columns: ['Location'],
      rows: [{ Location: 'Bridge Street, Chester' }, { Location: 'The "Old" Mill' }, { Location: 'a\nb' }],
    });

    expect(csv).toBe('Location\n"Bridge Street, Chester"\n"The ""Old"" Mill"\n"a\nb"\n');
  });

  it('writes columns in table order, ignoring extra row keys', () => {
    const csv = formatCsv({
      columns: ['b', 'a'],
      rows: [{ a: 1, b: 2, c: 3 }],
    });

    expect(csv).toBe('b,a\n2,1\n');
  });

  it('keeps a lone null cell distinguishable from a blank line', () => {
    const csv = formatCsv({ columns: ['a'], rows: [{ a: null }] });

    expect(csv).toBe('a\n""\n');
    expect(parseCsv(csv).rows).toEqual([{ a: null }]);
  });
});
