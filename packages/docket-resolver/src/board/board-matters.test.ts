/**
 * Tests for the board matter / section resolver
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { BoardIndex, causeFromLabel, matterLabel } from './board-matters.js';
import { buildTsrIndex } from '../codec/index.js';
import { DecodeError } from '../core/errors.js';
import type { PlatPoint } from './plats.js';
import { boardDataRow, boardDocumentRow } from '../__tests__/fixtures/rows.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('BoardIndex.mattersForSection', () => {
  const index = new BoardIndex(
    [
      boardDataRow({ DocketNumber: 'D1', CauseNumber: 'C1', Quip: 'first' }),
      boardDataRow({ DocketNumber: 'D1', CauseNumber: 'C1', Quip: 'repeat' }),
      boardDataRow({ DocketNumber: 'D2', CauseNumber: 'C2' }),
      boardDataRow({ Sec: '2', DocketNumber: 'D3', CauseNumber: 'C3' }),
    ],
    []
  );

  it('should return one matter per docket and cause', () => {
    const matters = index.mattersForSection('0115N02WS');

    expect(matters.map((m) => [m.docketNumber, m.causeNumber])).toEqual([
      ['D1', 'C1'],
      ['D2', 'C2'],
    ]);
    expect(matters[0]?.quip).toBe('first');
  });

  it('should reduce a plat code to its section', () => {
    expect(index.mattersForSection('0215N02WS1').map((m) => m.causeNumber)).toEqual(['C3']);
  });

  it('should return nothing for a section without records', () => {
    expect(index.mattersForSection('3601S01ES')).toEqual([]);
  });

  it('should reject a malformed section code', () => {
    expect(() => index.mattersForSection('0115N02W')).toThrow(DecodeError);
    expect(() => index.mattersForSection('0115X02WS')).toThrow(
      'Malformed location code: "0115X02WS"'
    );
  });
});

describe('BoardIndex construction', () => {
  it('should warn once about records whose section does not encode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const index = new BoardIndex(
      [boardDataRow({ Sec: null }), boardDataRow({ Range: 'x' }), boardDataRow()],
      []
    );

    expect(index.size).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(index.mattersForSection('0115N02WS')).toHaveLength(1);
  });
});

describe('BoardIndex.sectionsForMatter', () => {
  const index = new BoardIndex(
    [
      boardDataRow({ CauseNumber: '123-45', Conc: '011501N02WS1' }),
      boardDataRow({ CauseNumber: '123-45', Conc: '011502N02WS1' }),
      boardDataRow({ Sec: '9', CauseNumber: '999-99', Conc: '0115011N02WS1' }),
    ],
    []
  );

  it('should match plat codes exactly, not by shared prefix', () => {
    const sections = index.sectionsForMatter('123-45', [
      '011501N02WS1',
      '0115011N02WS1',
      '011502N02WS1',
      '011501N02WS1',
    ]);

    expect(sections).toEqual(['011501N02WS1', '011502N02WS1']);
  });

  it('should match plats subdividing a linked section', () => {
    const sections = index.sectionsForMatter('123-45', ['0115N02WS1', '0115N02WS2', '0215N02WS1']);
    expect(sections).toEqual(['0115N02WS1', '0115N02WS2']);
  });

  it('should warn about plat codes that only contain a linked code', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const sections = index.sectionsForMatter('123-45', ['1011501N02WS1', '011501N02WS1']);

    expect(sections).toEqual(['011501N02WS1']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain(
      'Cause 123-45: code 011501N02WS1 overlaps textually with 1011501N02WS1; exact match used'
    );
  });

  it('should return nothing for an unknown cause', () => {
    expect(index.sectionsForMatter('000-00', ['011501N02WS1'])).toEqual([]);
  });

  it('should list the linked codes of a cause', () => {
    expect([...index.linkedCodes('123-45')].sort()).toEqual([
      '011501N02WS1',
      '011502N02WS1',
      '0115N02WS',
    ]);
  });
});

describe('BoardIndex.polygonsForMatter', () => {
  it('should assemble the matched plats', () => {
    const index = new BoardIndex([boardDataRow({ CauseNumber: 'C1' })], []);
    const plats: PlatPoint[] = [
      { key: '0115N02WS1', easting: 0, northing: 0, boardDocket: 'D1', order: 0 },
      { key: '0115N02WS1', easting: 10, northing: 0, boardDocket: 'D1', order: 0 },
      { key: '0115N02WS1', easting: 10, northing: 10, boardDocket: 'D1', order: 0 },
      { key: '0215N02WS1', easting: 0, northing: 0, boardDocket: 'D1', order: 0 },
    ];

    const polygons = index.polygonsForMatter('C1', plats);

    expect(polygons.map((p) => [p.key, p.label, p.vertices.length])).toEqual([
      ['0115N02WS1', '1 15N 2W S', 3],
    ]);
  });
});

describe('BoardIndex.documentsForMatter', () => {
  it('should sort by date with undated documents last', () => {
    const index = new BoardIndex(
      [],
      [
        boardDocumentRow({ Cause: 'C1', Description: 'late-a', DocumentDate: '2024-05-01' }),
        boardDocumentRow({ Cause: 'C1', Description: 'undated', DocumentDate: null }),
        boardDocumentRow({ Cause: 'C1', Description: 'early', DocumentDate: '2024-01-10' }),
        boardDocumentRow({ Cause: 'C2', Description: 'other cause' }),
        boardDocumentRow({ Cause: 'C1', Description: 'late-b', DocumentDate: '2024-05-01' }),
      ]
    );

    expect(index.documentsForMatter('C1').map((d) => d.description)).toEqual([
      'early',
      'late-a',
      'late-b',
      'undated',
    ]);
  });

  it('should compare month/day/year dates as calendar dates', () => {
    const index = new BoardIndex(
      [],
      [
        boardDocumentRow({ Description: 'february', DocumentDate: '2/3/2024' }),
        boardDocumentRow({ Description: 'january', DocumentDate: '2024-01-10' }),
        boardDocumentRow({ Description: 'unreadable', DocumentDate: 'pending' }),
        boardDocumentRow({ Description: 'december', DocumentDate: '12/1/2023' }),
      ]
    );

    expect(index.documentsForMatter('100-01').map((d) => [d.description, d.date])).toEqual([
      ['december', '12/1/2023'],
      ['january', '2024-01-10'],
      ['february', '2/3/2024'],
      ['unreadable', 'pending'],
    ]);
  });
});

describe('BoardIndex.matterDetails', () => {
  const index = new BoardIndex(
    [
      boardDataRow({
        DocketNumber: 'D1',
        CauseNumber: 'C1',
        Quip: 'Spacing order',
        OrderType: 'Spacing',
        EffectiveDate: '2024-03-27',
        EndDate: '2025-03-27',
      }),
    ],
    [boardDocumentRow({ Cause: 'C1', Description: 'Order', Filepath: 'docs/order.pdf' })]
  );

  it('should carry the record fields and documents', () => {
    expect(index.matterDetails('C1')).toEqual({
      docketNumber: 'D1',
      causeNumber: 'C1',
      quip: 'Spacing order',
      orderType: 'Spacing',
      effectiveDate: '2024-03-27',
      endDate: '2025-03-27',
      documents: [{ description: 'Order', filepath: 'docs/order.pdf', date: '2024-03-27' }],
    });
  });

  it('should be null for an unknown cause', () => {
    expect(index.matterDetails('C9')).toBeNull();
  });
});

describe('BoardIndex.allMattersOverview', () => {
  it('should join sections and records, dedupe, and sort by docket then cause', () => {
    const index = new BoardIndex(
      [
        boardDataRow({ DocketNumber: 'D2', CauseNumber: 'C9' }),
        boardDataRow({ Sec: '2', DocketNumber: 'D1', CauseNumber: 'C2' }),
        boardDataRow({ DocketNumber: 'D1', CauseNumber: 'C1' }),
        boardDataRow({ DocketNumber: 'D1', CauseNumber: 'C1', Quip: 'again' }),
        boardDataRow({ Sec: '2', DocketNumber: 'D1', CauseNumber: 'C1' }),
        boardDataRow({ Sec: '3', DocketNumber: 'D0', CauseNumber: 'C0' }),
      ],
      []
    );

    const overview = index.allMattersOverview(buildTsrIndex(['0115N02WS1', '0215N02WS1']));

    expect(overview.map((row) => [row.code, row.matterLabel])).toEqual([
      ['0115N02WS', 'Docket Number:D1, Cause Number:C1'],
      ['0215N02WS', 'Docket Number:D1, Cause Number:C1'],
      ['0215N02WS', 'Docket Number:D1, Cause Number:C2'],
      ['0115N02WS', 'Docket Number:D2, Cause Number:C9'],
    ]);
    expect(overview[0]?.label).toBe('1 15N 2W S');
  });

  it('should list the TSR rows of a docket', () => {
    const index = new BoardIndex([], []);
    expect(index.sectionsWithMatters(['0215N02WS1', '0115N02WS2']).map((r) => r.label)).toEqual([
      '1 15N 2W S',
      '2 15N 2W S',
    ]);
  });
});

describe('matter labels', () => {
  it('should round-trip the cause number', () => {
    expect(causeFromLabel(matterLabel('2024-001', '123-45'))).toBe('123-45');
  });

  it('should accept a bare cause number', () => {
    expect(causeFromLabel(' 123-45 ')).toBe('123-45');
  });
});
