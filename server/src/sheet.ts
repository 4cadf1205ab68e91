import {
  type CellKey,
  type CellKind,
  type CellRecord,
  type CellRef,
  ERROR_TOKENS,
  type ErrorToken,
  type TypedValue,
  type UsedRange,
  type WorkbookSnapshot
} from './types.js';

export const MAX_ROWS = 1_048_576;
export const MAX_COLS = 16_384; // XFD

const EMPTY: TypedValue = { kind: 'empty' };

export function assertNever(x: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(x)}`);
}

export function errorTokenOf(text: string): ErrorToken | undefined {
  const t = text.trim().toUpperCase();
  return ERROR_TOKENS.find(e => e === t);
}

export function classifyCell(value: TypedValue, formula: string | null): CellKind {
  if (value.kind === 'error') return 'Error';
  return formula ? 'Formula' : 'Literal';
}

/** Sheet name, then row, then column. Plain code-unit comparison keeps the order locale-independent. */
export function compareRefs(a: CellRef, b: CellRef): number {
  if (a.sheet !== b.sheet) return a.sheet < b.sheet ? -1 : 1;
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

/**
 * Read-only accessors over a WorkbookSnapshot: A1 conversion, cell records
 * and row-wise iteration for the detectors.
 */
export class SheetModel {
  private rowIndex?: Map<string, Map<number, CellRecord[]>>;

  constructor(readonly snapshot: WorkbookSnapshot) {}

  // ===== Helpers =====
  static columnIndex(letters: string): number {
    const s = letters.toUpperCase();
    let col = 0;
    for (let i = 0; i < s.length; i++) col = col * 26 + (s.charCodeAt(i) - 64);
    return col;
  }

  static columnLetters(col: number): string {
    let n = col, s = '';
    while (n > 0) { const rem = (n - 1) % 26; s = String.fromCharCode(65 + rem) + s; n = Math.floor((n - 1) / 26); }
    return s;
  }

  static a1ToRc(ref: string): { row: number; col: number } {
    const m = ref.replace(/\$/g, '').match(/^([A-Za-z]+)([0-9]+)$/);
    if (!m) throw new Error(`Bad A1 ref: ${ref}`);
    return { row: parseInt(m[2], 10), col: SheetModel.columnIndex(m[1]) };
  }

  static rcToA1(row: number, col: number): string {
    return SheetModel.columnLetters(col) + row;
  }

  static keyOf(ref: CellRef): CellKey {
    return `${ref.sheet}!${SheetModel.rcToA1(ref.row, ref.col)}`;
  }

  static refOf(key: CellKey): CellRef {
    const i = key.lastIndexOf('!');
    if (i < 0) throw new Error(`Bad cell key: ${key}`);
    const { row, col } = SheetModel.a1ToRc(key.slice(i + 1));
    return { sheet: key.slice(0, i), row, col };
  }

  /** Display address, quoting the sheet name the way a formula would. */
  static address(ref: CellRef): string {
    const sheet = /^[A-Za-z_][A-Za-z0-9_.]*$/.test(ref.sheet) ? ref.sheet : `'${ref.sheet.replace(/'/g, "''")}'`;
    return `${sheet}!${SheetModel.rcToA1(ref.row, ref.col)}`;
  }

  // ===== Cells =====
  has(ref: CellRef): boolean {
    const key = SheetModel.keyOf(ref);
    return this.snapshot.values.has(key) || this.snapshot.formulas.has(key);
  }

  value(ref: CellRef): TypedValue {
    return this.snapshot.values.get(SheetModel.keyOf(ref)) ?? EMPTY;
  }

  formula(ref: CellRef): string | null {
    return this.snapshot.formulas.get(SheetModel.keyOf(ref)) ?? null;
  }

  record(ref: CellRef): CellRecord | undefined {
    if (!this.has(ref)) return undefined;
    const value = this.value(ref);
    const formula = this.formula(ref);
    return { ref, value, formula, kind: classifyCell(value, formula) };
  }

  numberAt(ref: CellRef): number | undefined {
    const v = this.value(ref);
    return v.kind === 'number' ? v.value : undefined;
  }

  textAt(ref: CellRef): string | undefined {
    const v = this.value(ref);
    return v.kind === 'text' ? v.value : undefined;
  }

  usedRange(sheet: string): UsedRange | undefined {
    return this.snapshot.usedRanges.get(sheet);
  }

  /** Every populated cell, in CellRef order. */
  records(): CellRecord[] {
    const keys = new Set<CellKey>([...this.snapshot.values.keys(), ...this.snapshot.formulas.keys()]);
    const out: CellRecord[] = [];
    for (const key of keys) {
      const rec = this.record(SheetModel.refOf(key));
      if (rec) out.push(rec);
    }
    return out.sort((a, b) => compareRefs(a.ref, b.ref));
  }

  /** Populated cells of one sheet grouped by row, each row sorted by column. */
  rows(sheet: string): Map<number, CellRecord[]> {
    if (!this.rowIndex) {
      this.rowIndex = new Map();
      for (const rec of this.records()) {
        let bySheet = this.rowIndex.get(rec.ref.sheet);
        if (!bySheet) { bySheet = new Map(); this.rowIndex.set(rec.ref.sheet, bySheet); }
        const row = bySheet.get(rec.ref.row);
        if (row) row.push(rec); else bySheet.set(rec.ref.row, [rec]);
      }
    }
    return this.rowIndex.get(sheet) ?? new Map();
  }
}
