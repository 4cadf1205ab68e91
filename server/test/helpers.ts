import * as XLSX from 'xlsx';

import { snapshotFromWorkBook } from '../src/loader.js';
import type { ErrorToken, WorkbookSnapshot } from '../src/types.js';

/** Cell shorthand: a literal, a formula with its cached value, or an error value. */
export type CellSpec =
  | number
  | string
  | boolean
  | { f: string; v?: number | string | boolean }
  | { error: ErrorToken; f?: string };

export type SheetSpec = Record<string, CellSpec>;

const ERROR_CODES: Partial<Record<ErrorToken, number>> = {
  '#NULL!': 0x00,
  '#DIV/0!': 0x07,
  '#VALUE!': 0x0f,
  '#REF!': 0x17,
  '#NAME?': 0x1d,
  '#NUM!': 0x24,
  '#N/A': 0x2a
};

function cellObject(spec: CellSpec): XLSX.CellObject {
  if (typeof spec === 'number') return { t: 'n', v: spec };
  if (typeof spec === 'string') return { t: 's', v: spec };
  if (typeof spec === 'boolean') return { t: 'b', v: spec };
  if ('error' in spec) {
    const cell: XLSX.CellObject = { t: 'e', v: ERROR_CODES[spec.error] ?? 0x0f, w: spec.error };
    if (spec.f) cell.f = spec.f.replace(/^=/, '');
    return cell;
  }
  const v = spec.v ?? 0;
  const t = typeof v === 'number' ? 'n' : typeof v === 'string' ? 's' : 'b';
  return { t, v, f: spec.f.replace(/^=/, '') };
}

export function workbook(
  sheets: Record<string, SheetSpec>,
  names: { Name: string; Ref: string; Sheet?: number }[] = []
): XLSX.WorkBook {
  const book = XLSX.utils.book_new();
  for (const [name, cells] of Object.entries(sheets)) {
    const ws: XLSX.WorkSheet = {};
    let range: XLSX.Range | undefined;
    for (const [addr, spec] of Object.entries(cells)) {
      ws[addr] = cellObject(spec);
      const { r, c } = XLSX.utils.decode_cell(addr);
      range = range
        ? { s: { r: Math.min(range.s.r, r), c: Math.min(range.s.c, c) }, e: { r: Math.max(range.e.r, r), c: Math.max(range.e.c, c) } }
        : { s: { r, c }, e: { r, c } };
    }
    if (range) ws['!ref'] = XLSX.utils.encode_range(range);
    XLSX.utils.book_append_sheet(book, ws, name);
  }
  if (names.length) book.Workbook = { Names: names };
  return book;
}

/** In-memory snapshot, as the loader would produce for `model.xlsx`. */
export function snapshotOf(sheets: Record<string, SheetSpec>, source = 'model.xlsx'): WorkbookSnapshot {
  return snapshotFromWorkBook(workbook(sheets), source);
}

export function xlsxBuffer(sheets: Record<string, SheetSpec>): Buffer {
  return XLSX.write(workbook(sheets), { type: 'buffer', bookType: 'xlsx' }) as Buffer;
}

// A1 = B1 + 1, B1 = A1 + 1
export const CYCLE: Record<string, SheetSpec> = {
  Sheet1: { A1: { f: '=B1+1', v: 0 }, B1: { f: '=A1+1', v: 0 } }
};
