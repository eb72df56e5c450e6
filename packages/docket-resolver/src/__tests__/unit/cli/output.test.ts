/**
 * Output formatting tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatCsv,
  formatOutput,
  formatTable,
  formatters,
  type TableColumn,
} from '../../../cli/lib/output.js';

interface Row {
  readonly name: string;
  readonly count: number;
  readonly tags: readonly string[];
  readonly note: string | null;
}

const COLUMNS: readonly TableColumn<Row>[] = [
  { key: 'name', header: 'Name' },
  { key: 'count', header: 'N', align: 'right' },
  { key: 'tags', header: 'Tags' },
  { key: 'note', header: 'Note' },
];

const ROWS: readonly Row[] = [
  { name: 'north', count: 5, tags: ['a', 'b'], note: null },
  { name: 'south', count: 12, tags: [], note: 'say "hi", twice' },
];

describe('formatTable', () => {
  it('should align columns and blank out nulls', () => {
    expect(formatTable(ROWS, COLUMNS).split('\n')).toEqual([
      'Name  |  N | Tags | Note',
      '------+----+------+----------------',
      'north |  5 | a, b |',
      'south | 12 |      | say "hi", twice',
    ]);
  });

  it('should truncate to a fixed width', () => {
    const columns: readonly TableColumn<Row>[] = [{ key: 'name', header: 'Name', width: 4 }];
    expect(formatTable(ROWS, columns).split('\n')[2]).toBe('nor~');
  });

  it('should report an empty result', () => {
    expect(formatTable([], COLUMNS)).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('should quote values containing commas or quotes', () => {
    expect(formatCsv(ROWS, COLUMNS).split('\n')).toEqual([
      'Name,N,Tags,Note',
      'north,5,"a, b",',
      'south,12,,"say ""hi"", twice"',
    ]);
  });

  it('should emit only the header for no rows', () => {
    expect(formatCsv([], COLUMNS)).toBe('Name,N,Tags,Note');
  });
});

describe('formatOutput', () => {
  it('should emit the rows as indented JSON', () => {
    expect(formatOutput(ROWS.slice(0, 1), 'json', COLUMNS)).toBe(
      JSON.stringify([{ name: 'north', count: 5, tags: ['a', 'b'], note: null }], null, 2)
    );
  });

  it('should apply column formatters', () => {
    const columns: readonly TableColumn<Row>[] = [
      { key: 'count', header: 'Count', formatter: formatters.fixed(1) },
      { key: 'tags', header: 'Tags', formatter: formatters.count },
    ];
    expect(formatOutput(ROWS, 'csv', columns)).toBe('Count,Tags\n5.0,2\n12.0,0');
  });
});
