import { readFile } from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';

import { UnreadableWorkbookError, UnsupportedFormatError } from './errors.js';
import { createLogger } from './logger.js';
import { SheetModel, assertNever, errorTokenOf } from './sheet.js';
import type { CellKey, ErrorToken, TypedValue, UsedRange, WorkbookSnapshot } from './types.js';

const log = createLogger('loader');

const WORKBOOK_FORMATS = new Set(['.xlsx', '.xlsm', '.xlsb', '.xls', '.ods']);
const VALUE_ONLY_FORMATS = new Set(['.csv', '.tsv', '.txt']);

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
const CFB_MAGIC = [0xd0, 0xcf, 0x11, 0xe0];

// BIFF error codes as SheetJS stores them in `v` for cells of type 'e'
const ERROR_CODES: Record<number, ErrorToken> = {
  0x00: '#NULL!',
  0x07: '#DIV/0!',
  0x0f: '#VALUE!',
  0x17: '#REF!',
  0x1d: '#NAME?',
  0x24: '#NUM!',
  0x2a: '#N/A',
  0x2b: '#GETTING_DATA'
};

export type LoadOptions = {
  /** Fail with UnsupportedFormatError instead of returning a values-only snapshot */
  requireFormulas?: boolean;
};

const EMPTY: TypedValue = { kind: 'empty' };

function startsWith(bytes: Uint8Array, magic: number[]) {
  return bytes.length >= magic.length && magic.every((b, i) => bytes[i] === b);
}

function isCellObject(x: unknown): x is XLSX.CellObject {
  return typeof x === 'object' && x !== null && 't' in x;
}

function decodeValue(cell: XLSX.CellObject): TypedValue {
  switch (cell.t) {
    case 'n':
      return typeof cell.v === 'number' && Number.isFinite(cell.v) ? { kind: 'number', value: cell.v } : EMPTY;
    case 's': {
      if (typeof cell.v !== 'string' || cell.v === '') return EMPTY;
      const token = errorTokenOf(cell.v);
      return token ? { kind: 'error', value: token } : { kind: 'text', value: cell.v };
    }
    case 'b':
      return typeof cell.v === 'boolean' ? { kind: 'bool', value: cell.v } : EMPTY;
    case 'e': {
      const token = (cell.w ? errorTokenOf(cell.w) : undefined) ?? (typeof cell.v === 'number' ? ERROR_CODES[cell.v] : undefined);
      return { kind: 'error', value: token ?? '#VALUE!' };
    }
    case 'd':
      return cell.v instanceof Date ? { kind: 'text', value: cell.v.toISOString() } : EMPTY;
    case 'z':
      return EMPTY;
    default:
      return assertNever(cell.t);
  }
}

/** Convert a SheetJS workbook already in memory into an audit snapshot. */
export function snapshotFromWorkBook(book: XLSX.WorkBook, source: string, hasFormulas = true): WorkbookSnapshot {
  const values = new Map<CellKey, TypedValue>();
  const formulas = new Map<CellKey, string | null>();
  const usedRanges = new Map<string, UsedRange>();

  for (const sheet of book.SheetNames) {
    const ws = book.Sheets[sheet];
    if (!ws) continue;
    let used: UsedRange | undefined;

    for (const addr of Object.keys(ws)) {
      if (addr.startsWith('!')) continue;
      const cell: unknown = ws[addr];
      if (!isCellObject(cell)) continue;

      const value = decodeValue(cell);
      const formula = hasFormulas && typeof cell.f === 'string' && cell.f.trim() ? `=${cell.f}` : null;
      if (value.kind === 'empty' && !formula) continue;

      const { r, c } = XLSX.utils.decode_cell(addr);
      const ref = { sheet, row: r + 1, col: c + 1 };
      const key = SheetModel.keyOf(ref);
      values.set(key, value);
      if (hasFormulas) formulas.set(key, formula);

      used = used
        ? {
            minRow: Math.min(used.minRow, ref.row), maxRow: Math.max(used.maxRow, ref.row),
            minCol: Math.min(used.minCol, ref.col), maxCol: Math.max(used.maxCol, ref.col)
          }
        : { minRow: ref.row, maxRow: ref.row, minCol: ref.col, maxCol: ref.col };
    }
    if (used) usedRanges.set(sheet, used);
  }

  const names = new Map<string, string>();
  for (const dn of book.Workbook?.Names ?? []) {
    if (!dn.Name || !dn.Ref) continue;
    const scope = dn.Sheet !== undefined ? book.SheetNames[dn.Sheet] : undefined;
    names.set(scope ? `${scope}!${dn.Name.toUpperCase()}` : dn.Name.toUpperCase(), dn.Ref);
  }

  return { source, sheetNames: [...book.SheetNames], values, formulas, usedRanges, names, hasFormulas };
}

/** Parse workbook bytes. `fileName` decides the container format. */
export function loadWorkbookBuffer(data: Uint8Array, fileName: string, options: LoadOptions = {}): WorkbookSnapshot {
  const source = path.basename(fileName);
  const ext = path.extname(fileName).toLowerCase();

  const valueOnly = VALUE_ONLY_FORMATS.has(ext);
  if (!valueOnly && !WORKBOOK_FORMATS.has(ext)) {
    throw new UnreadableWorkbookError(source, `unsupported file type '${ext || '(none)'}'`);
  }
  if (valueOnly && options.requireFormulas) {
    throw new UnsupportedFormatError(source, ext.slice(1).toUpperCase());
  }
  if (ext === '.xls' ? !startsWith(data, CFB_MAGIC) : !valueOnly && !startsWith(data, ZIP_MAGIC)) {
    throw new UnreadableWorkbookError(source, 'not a valid spreadsheet container (corrupt or mislabelled)');
  }

  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(data, { type: 'buffer', cellFormula: !valueOnly, cellText: true, cellDates: true, cellNF: false });
  } catch (e) {
    throw new UnreadableWorkbookError(source, (e as Error).message, { cause: e });
  }
  if (book.SheetNames.length === 0) {
    throw new UnreadableWorkbookError(source, 'workbook has no sheets');
  }

  const snapshot = snapshotFromWorkBook(book, source, !valueOnly);
  const formulaCount = [...snapshot.formulas.values()].filter(f => f !== null).length;
  log.info(`${source}: ${snapshot.sheetNames.length} sheet(s), ${snapshot.values.size} cell(s), ${formulaCount} formula(s)${valueOnly ? ' [values only]' : ''}`);
  return snapshot;
}

export async function loadWorkbook(filePath: string, options: LoadOptions = {}): Promise<WorkbookSnapshot> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (e) {
    throw new UnreadableWorkbookError(path.basename(filePath), (e as Error).message, { cause: e });
  }
  return loadWorkbookBuffer(data, filePath, options);
}
