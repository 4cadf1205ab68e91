import { describe, expect, it } from 'vitest';

import { type ParseContext, parseFormula, tokenizeFormula } from '../src/formula.js';
import { FormulaSyntaxError } from '../src/errors.js';
import type { UsedRange } from '../src/types.js';

function context(sheetNames: string[], opts: { used?: Record<string, UsedRange>; names?: [string, string][] } = {}): ParseContext {
  return {
    sheetNames,
    usedRange: sheet => opts.used?.[sheet],
    names: new Map(opts.names ?? []),
    maxRangeCells: 50_000,
    bookName: 'model.xlsx'
  };
}

const ctx = context(['Sheet1', 'Sheet2']);

describe('tokenizeFormula', () => {
  it('splits a formula into typed tokens', () => {
    const types = tokenizeFormula('=IF(A1>=2,TRUE,"no")').map(t => t.type);
    expect(types).toEqual(['function', 'open', 'reference', 'operator', 'number', 'separator', 'bool', 'separator', 'string', 'close']);
  });

  it('strips the future-function prefix from function names', () => {
    const [fn] = tokenizeFormula('=_xlfn.XLOOKUP(A1,B:B,C:C)');
    expect(fn).toMatchObject({ type: 'function', name: 'XLOOKUP' });
  });

  it('reads doubled quotes inside strings', () => {
    const [tok] = tokenizeFormula('="say ""hi"""');
    expect(tok).toMatchObject({ type: 'string', value: 'say "hi"' });
  });

  it('rejects unbalanced parentheses', () => {
    expect(() => tokenizeFormula('=SUM(A1')).toThrow(FormulaSyntaxError);
    expect(() => tokenizeFormula('=A1)')).toThrow('Unbalanced ")" at position 3');
  });

  it('rejects formulas without the leading marker', () => {
    expect(() => tokenizeFormula('A1+1')).toThrow(FormulaSyntaxError);
  });
});

describe('parseFormula', () => {
  it('resolves a cell, a range and a cross-sheet cell to exactly those cells', () => {
    const parsed = parseFormula('=SUM(A1,B2:B5,Sheet2!C3)', 'Sheet1', ctx);
    expect(parsed.references).toEqual([
      { sheet: 'Sheet1', row: 1, col: 1 },
      { sheet: 'Sheet1', row: 2, col: 2 },
      { sheet: 'Sheet1', row: 3, col: 2 },
      { sheet: 'Sheet1', row: 4, col: 2 },
      { sheet: 'Sheet1', row: 5, col: 2 },
      { sheet: 'Sheet2', row: 3, col: 3 }
    ]);
    expect(parsed.direct).toEqual([
      { sheet: 'Sheet1', row: 1, col: 1 },
      { sheet: 'Sheet2', row: 3, col: 3 }
    ]);
    expect(parsed.functions).toEqual(['SUM']);
    expect(parsed.warning).toBeUndefined();
  });

  it('treats absolute and relative forms of a cell as the same reference', () => {
    expect(parseFormula('=$A$1+A1+A$1', 'Sheet1', ctx).references).toEqual([{ sheet: 'Sheet1', row: 1, col: 1 }]);
  });

  it('does not read references out of string literals', () => {
    expect(parseFormula('="A1"&B1', 'Sheet1', ctx).references).toEqual([{ sheet: 'Sheet1', row: 1, col: 2 }]);
  });

  it('still scans the arguments of unknown functions', () => {
    const parsed = parseFormula('=FOOBAR(C3, 2)', 'Sheet1', ctx);
    expect(parsed.references).toEqual([{ sheet: 'Sheet1', row: 3, col: 3 }]);
    expect(parsed.functions).toEqual(['FOOBAR']);
  });

  it('bounds whole-column references to the used range', () => {
    const used = { Sheet1: { minRow: 1, maxRow: 3, minCol: 1, maxCol: 2 } };
    expect(parseFormula('=SUM(B:B)', 'Sheet1', context(['Sheet1'], { used })).references).toEqual([
      { sheet: 'Sheet1', row: 1, col: 2 },
      { sheet: 'Sheet1', row: 2, col: 2 },
      { sheet: 'Sheet1', row: 3, col: 2 }
    ]);
  });

  it('bounds whole-row references to the used range', () => {
    const used = { Sheet1: { minRow: 1, maxRow: 3, minCol: 1, maxCol: 2 } };
    expect(parseFormula('=SUM(3:3)', 'Sheet1', context(['Sheet1'], { used })).references).toEqual([
      { sheet: 'Sheet1', row: 3, col: 1 },
      { sheet: 'Sheet1', row: 3, col: 2 }
    ]);
  });

  it('resolves quoted sheet names case-insensitively', () => {
    const parsed = parseFormula("='my sheet'!B2", 'Sheet1', context(['Sheet1', 'My Sheet']));
    expect(parsed.references).toEqual([{ sheet: 'My Sheet', row: 2, col: 2 }]);
  });

  it('expands 3-D references over the sheets between the two names', () => {
    const parsed = parseFormula('=SUM(Jan:Mar!A1)', 'Summary', context(['Summary', 'Jan', 'Feb', 'Mar']));
    expect(parsed.references).toEqual([
      { sheet: 'Jan', row: 1, col: 1 },
      { sheet: 'Feb', row: 1, col: 1 },
      { sheet: 'Mar', row: 1, col: 1 }
    ]);
  });

  it('keeps references to other workbooks out of the cell list', () => {
    const parsed = parseFormula('=[Budget.xlsx]Plan!B4*2', 'Sheet1', ctx);
    expect(parsed.references).toEqual([]);
    expect(parsed.external).toEqual([{ book: 'Budget.xlsx', sheet: 'Plan', text: '[Budget.xlsx]Plan!B4' }]);
  });

  it('resolves defined names through the name table', () => {
    const parsed = parseFormula('=SUM(Revenue)', 'Sheet1', context(['Sheet1'], { names: [['REVENUE', 'Sheet1!$B$2:$B$3']] }));
    expect(parsed.references).toEqual([
      { sheet: 'Sheet1', row: 2, col: 2 },
      { sheet: 'Sheet1', row: 3, col: 2 }
    ]);
    expect(parsed.direct).toEqual([]);
  });

  it('records error literals', () => {
    expect(parseFormula('=#REF!+1', 'Sheet1', ctx).errorTokens).toEqual(['#REF!']);
  });

  it('returns a warning and no references when the formula cannot be tokenized', () => {
    const parsed = parseFormula('=SUM(A1', 'Sheet1', ctx);
    expect(parsed.references).toEqual([]);
    expect(parsed.warning).toEqual({ formula: '=SUM(A1', message: 'Unbalanced "(" at position 7', position: 7 });
  });
});
