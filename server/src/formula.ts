import { FormulaSyntaxError } from './errors.js';
import { MAX_COLS, MAX_ROWS, SheetModel, errorTokenOf } from './sheet.js';
import type {
  ErrorToken,
  ParsedFormula,
  UsedRange,
  WorkbookSnapshot
} from './types.js';

export type Area =
  | { kind: 'cell'; row: number; col: number }
  | { kind: 'range'; r1: number; c1: number; r2: number; c2: number }
  | { kind: 'columns'; c1: number; c2: number }
  | { kind: 'rows'; r1: number; r2: number };

export type RefSpec = {
  sheet?: string;
  /** last sheet of a 3-D reference (`Jan:Dec!B4`) */
  endSheet?: string;
  book?: string;
  path?: string;
  /** absent only for external defined names (`[1]!Rates`) */
  area?: Area;
};

export type Token =
  | { type: 'function'; text: string; pos: number; name: string }
  | { type: 'reference'; text: string; pos: number; ref: RefSpec }
  | { type: 'number'; text: string; pos: number; value: number }
  | { type: 'string'; text: string; pos: number; value: string }
  | { type: 'bool'; text: string; pos: number; value: boolean }
  | { type: 'error'; text: string; pos: number; value: ErrorToken }
  | { type: 'name'; text: string; pos: number }
  | { type: 'operator'; text: string; pos: number }
  | { type: 'open' | 'close' | 'array-open' | 'array-close' | 'separator'; text: string; pos: number };

const CELL = String.raw`\$?[A-Za-z]{1,3}\$?\d+`;
const ADDRESS_RE = new RegExp(
  String.raw`^(?:(${CELL})(?::(${CELL}))?|(\$?[A-Za-z]{1,3}):(\$?[A-Za-z]{1,3})|(\$?\d+):(\$?\d+))(?![\w.(!\[$])`
);
const SHEET_PREFIX_RE = /^([\p{L}_\\][\p{L}\p{N}_.\\]*)(?::([\p{L}_\\][\p{L}\p{N}_.\\]*))?!/u;
const BOOK_SHEET_RE = /^([\p{L}_\\][\p{L}\p{N}_.\\]*)?!/u;
const WORD_RE = /^[\p{L}_\\][\p{L}\p{N}_.\\?]*/u;
const NUMBER_RE = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const OPERATORS_2 = ['<>', '<=', '>='];
const OPERATORS_1 = '+-*/^&=<>%@:';
// a workbook file named inside a string literal, e.g. INDIRECT("'[Budget.xlsx]Plan'!B4")
const EXTERNAL_TEXT_RE = /(?:\[|[\\/])([^\\/[\]'"!]+\.(?:xlsx|xlsm|xlsb|xls|ods|csv))\b/i;

function columnOf(letters: string): number | undefined {
  const col = SheetModel.columnIndex(letters.replace(/\$/g, ''));
  return col >= 1 && col <= MAX_COLS ? col : undefined;
}

function rowOf(digits: string): number | undefined {
  const row = parseInt(digits.replace(/\$/g, ''), 10);
  return row >= 1 && row <= MAX_ROWS ? row : undefined;
}

function cellOf(text: string): { row: number; col: number } | undefined {
  const m = text.replace(/\$/g, '').match(/^([A-Za-z]+)(\d+)$/);
  if (!m) return undefined;
  const col = columnOf(m[1]);
  const row = rowOf(m[2]);
  return col !== undefined && row !== undefined ? { row, col } : undefined;
}

/** Match a cell, range, column-range or row-range address at the start of `s`. */
function matchAddress(s: string): { area: Area; length: number } | undefined {
  const m = s.match(ADDRESS_RE);
  if (!m) return undefined;
  const length = m[0].length;
  if (m[1]) {
    const a = cellOf(m[1]);
    if (!a) return undefined;
    if (!m[2]) return { area: { kind: 'cell', ...a }, length };
    const b = cellOf(m[2]);
    if (!b) return undefined;
    return { area: { kind: 'range', r1: a.row, c1: a.col, r2: b.row, c2: b.col }, length };
  }
  if (m[3] && m[4]) {
    const c1 = columnOf(m[3]), c2 = columnOf(m[4]);
    return c1 && c2 ? { area: { kind: 'columns', c1, c2 }, length } : undefined;
  }
  if (m[5] && m[6]) {
    const r1 = rowOf(m[5]), r2 = rowOf(m[6]);
    return r1 && r2 ? { area: { kind: 'rows', r1, r2 }, length } : undefined;
  }
  return undefined;
}

function matchErrorToken(s: string): ErrorToken | undefined {
  const m = s.match(/^#[A-Za-z0-9/_]+[!?]?/);
  return m ? errorTokenOf(m[0]) : undefined;
}

/** Split the inside of a quoted prefix: `C:\dir\[Book.xlsx]Sheet`, `Jan:Dec`, `My Sheet`. */
function splitQualifier(inner: string): Omit<RefSpec, 'area'> {
  const m = inner.match(/^(.*)\[([^\]]+)\](.*)$/);
  if (m) return { path: m[1] || undefined, book: m[2], sheet: m[3] || undefined };
  if (/[\\/]/.test(inner)) {
    const base = inner.split(/[\\/]/).pop() ?? inner;
    return { path: inner, book: base };
  }
  const colon = inner.indexOf(':');
  if (colon > 0) return { sheet: inner.slice(0, colon), endSheet: inner.slice(colon + 1) };
  return { sheet: inner };
}

/**
 * Tokenize a formula string (leading `=` required). Unknown function names
 * are ordinary `function` tokens; anything outside the grammar throws
 * FormulaSyntaxError.
 */
export function tokenizeFormula(formula: string): Token[] {
  if (!formula.startsWith('=')) throw new FormulaSyntaxError('Formula must start with "="', 0);

  const s = formula;
  const tokens: Token[] = [];
  const stack: ('(' | '{')[] = [];
  let i = 1;

  const last = () => tokens[tokens.length - 1];

  // Reads `[...]` with nesting and `'` escapes; returns index just past the closing bracket
  const bracketEnd = (start: number): number => {
    let depth = 0;
    for (let j = start; j < s.length; j++) {
      const ch = s[j];
      if (ch === "'") { j++; continue; }
      if (ch === '[') depth++;
      else if (ch === ']' && --depth === 0) return j + 1;
    }
    throw new FormulaSyntaxError('Unterminated "["', start);
  };

  // Address (or #REF!, or a bare name for external refs) after a sheet qualifier
  const qualified = (start: number, pos: number, qualifier: Omit<RefSpec, 'area'>): number => {
    const rest = s.slice(start);
    const addr = matchAddress(rest);
    if (addr) {
      tokens.push({ type: 'reference', text: s.slice(pos, start + addr.length), pos, ref: { ...qualifier, area: addr.area } });
      return start + addr.length;
    }
    const err = matchErrorToken(rest);
    if (err) {
      tokens.push({ type: 'error', text: s.slice(pos, start + err.length), pos, value: err });
      return start + err.length;
    }
    const word = rest.match(WORD_RE);
    if (word && qualifier.book) {
      tokens.push({ type: 'reference', text: s.slice(pos, start + word[0].length), pos, ref: { ...qualifier } });
      return start + word[0].length;
    }
    if (word) {
      // sheet-scoped defined name: Sheet1!Rate
      tokens.push({ type: 'name', text: s.slice(pos, start + word[0].length), pos });
      return start + word[0].length;
    }
    throw new FormulaSyntaxError('Expected a cell address after sheet name', start);
  };

  while (i < s.length) {
    const ch = s[i];
    const rest = s.slice(i);

    if (/\s/.test(ch)) { i++; continue; }

    if (ch === '"') {
      let j = i + 1, value = '';
      for (;;) {
        if (j >= s.length) throw new FormulaSyntaxError('Unterminated string', i);
        if (s[j] === '"') {
          if (s[j + 1] === '"') { value += '"'; j += 2; continue; }
          break;
        }
        value += s[j++];
      }
      tokens.push({ type: 'string', text: s.slice(i, j + 1), pos: i, value });
      i = j + 1;
      continue;
    }

    if (ch === "'") {
      let j = i + 1, inner = '';
      for (;;) {
        if (j >= s.length) throw new FormulaSyntaxError('Unterminated quoted sheet name', i);
        if (s[j] === "'") {
          if (s[j + 1] === "'") { inner += "'"; j += 2; continue; }
          break;
        }
        inner += s[j++];
      }
      if (s[j + 1] !== '!') throw new FormulaSyntaxError('Quoted name must be followed by "!"', j + 1);
      i = qualified(j + 2, i, splitQualifier(inner));
      continue;
    }

    if (ch === '[') {
      const end = bracketEnd(i);
      const sheetPart = s.slice(end).match(BOOK_SHEET_RE);
      if (sheetPart) {
        i = qualified(end + sheetPart[0].length, i, { book: s.slice(i + 1, end - 1), sheet: sheetPart[1] || undefined });
      } else {
        // table-relative structured reference such as [@Revenue]
        tokens.push({ type: 'name', text: s.slice(i, end), pos: i });
        i = end;
      }
      continue;
    }

    if (ch === '#') {
      const err = matchErrorToken(rest);
      if (err) {
        tokens.push({ type: 'error', text: rest.slice(0, err.length), pos: i, value: err });
        i += err.length;
        continue;
      }
      const prev = last();
      if (prev && (prev.type === 'reference' || prev.type === 'close')) {
        tokens.push({ type: 'operator', text: '#', pos: i }); // spill range operator
        i++;
        continue;
      }
      throw new FormulaSyntaxError('Unknown error literal', i);
    }

    if (ch === '(' || ch === '{') {
      stack.push(ch);
      tokens.push({ type: ch === '(' ? 'open' : 'array-open', text: ch, pos: i });
      i++;
      continue;
    }
    if (ch === ')' || ch === '}') {
      const want = ch === ')' ? '(' : '{';
      if (stack.pop() !== want) throw new FormulaSyntaxError(`Unbalanced "${ch}"`, i);
      tokens.push({ type: ch === ')' ? 'close' : 'array-close', text: ch, pos: i });
      i++;
      continue;
    }
    if (ch === ',' || ch === ';') {
      tokens.push({ type: 'separator', text: ch, pos: i });
      i++;
      continue;
    }

    const op2 = OPERATORS_2.find(op => rest.startsWith(op));
    if (op2) {
      tokens.push({ type: 'operator', text: op2, pos: i });
      i += 2;
      continue;
    }

    // Sheet-qualified reference: Sheet1!A1, Jan:Dec!B4
    const prefix = rest.match(SHEET_PREFIX_RE);
    if (prefix) {
      i = qualified(i + prefix[0].length, i, { sheet: prefix[1], endSheet: prefix[2] });
      continue;
    }

    if (ch === '$' || /[A-Za-z0-9]/.test(ch)) {
      const addr = matchAddress(rest);
      if (addr) {
        tokens.push({ type: 'reference', text: rest.slice(0, addr.length), pos: i, ref: { area: addr.area } });
        i += addr.length;
        continue;
      }
    }

    const num = rest.match(NUMBER_RE);
    if (num) {
      tokens.push({ type: 'number', text: num[0], pos: i, value: Number(num[0]) });
      i += num[0].length;
      continue;
    }

    const word = rest.match(WORD_RE);
    if (word) {
      const text = word[0];
      const next = s[i + text.length];
      if (next === '(') {
        const name = text.toUpperCase().replace(/^(?:_XL(?:FN|WS)\.)+/, '');
        tokens.push({ type: 'function', text, pos: i, name });
        i += text.length;
      } else if (next === '[') {
        // structured reference: Table1[Revenue], Table1[[#This Row],[Cost]]
        const end = bracketEnd(i + text.length);
        tokens.push({ type: 'name', text: s.slice(i, end), pos: i });
        i = end;
      } else if (/^(TRUE|FALSE)$/i.test(text)) {
        tokens.push({ type: 'bool', text, pos: i, value: text.toUpperCase() === 'TRUE' });
        i += text.length;
      } else {
        tokens.push({ type: 'name', text, pos: i });
        i += text.length;
      }
      continue;
    }

    if (OPERATORS_1.includes(ch)) {
      tokens.push({ type: 'operator', text: ch, pos: i });
      i++;
      continue;
    }

    throw new FormulaSyntaxError(`Unexpected character "${ch}"`, i);
  }

  if (stack.length) throw new FormulaSyntaxError(`Unbalanced "${stack[stack.length - 1]}"`, s.length);
  return tokens;
}

// ===== Reference resolution =====

export type ParseContext = {
  sheetNames: readonly string[];
  usedRange(sheet: string): UsedRange | undefined;
  names: ReadonlyMap<string, string>;
  /** Ranges with more cells than this are clipped to the sheet's used range */
  maxRangeCells: number;
  /** File name of the workbook being audited; `[ThisBook.xlsx]` references are internal */
  bookName?: string;
};

export function parseContextFor(snapshot: WorkbookSnapshot, maxRangeCells = 50_000): ParseContext {
  return {
    sheetNames: snapshot.sheetNames,
    usedRange: sheet => snapshot.usedRanges.get(sheet),
    names: snapshot.names,
    maxRangeCells,
    bookName: snapshot.source
  };
}

const MAX_NAME_DEPTH = 5;

function canonicalSheet(ctx: ParseContext, sheet: string): string {
  const lower = sheet.toLowerCase();
  return ctx.sheetNames.find(n => n.toLowerCase() === lower) ?? sheet;
}

function sheetsFor(ctx: ParseContext, spec: RefSpec, current: string): string[] {
  const first = canonicalSheet(ctx, spec.sheet ?? current);
  if (!spec.endSheet) return [first];
  const last = canonicalSheet(ctx, spec.endSheet);
  const a = ctx.sheetNames.indexOf(first), b = ctx.sheetNames.indexOf(last);
  if (a < 0 || b < 0) return [first];
  return ctx.sheetNames.slice(Math.min(a, b), Math.max(a, b) + 1);
}

type Rect = { r1: number; c1: number; r2: number; c2: number };

function rectFor(area: Area, used: UsedRange | undefined): Rect | undefined {
  switch (area.kind) {
    case 'cell': return { r1: area.row, c1: area.col, r2: area.row, c2: area.col };
    case 'range': return {
      r1: Math.min(area.r1, area.r2), c1: Math.min(area.c1, area.c2),
      r2: Math.max(area.r1, area.r2), c2: Math.max(area.c1, area.c2)
    };
    case 'columns':
      return used ? { r1: used.minRow, r2: used.maxRow, c1: Math.min(area.c1, area.c2), c2: Math.max(area.c1, area.c2) } : undefined;
    case 'rows':
      return used ? { r1: Math.min(area.r1, area.r2), r2: Math.max(area.r1, area.r2), c1: used.minCol, c2: used.maxCol } : undefined;
  }
}

function clip(rect: Rect, used: UsedRange | undefined, max: number): Rect | undefined {
  const size = (rect.r2 - rect.r1 + 1) * (rect.c2 - rect.c1 + 1);
  if (size <= max) return rect;
  if (!used) return undefined;
  const out = {
    r1: Math.max(rect.r1, used.minRow), r2: Math.min(rect.r2, used.maxRow),
    c1: Math.max(rect.c1, used.minCol), c2: Math.min(rect.c2, used.maxCol)
  };
  return out.r1 <= out.r2 && out.c1 <= out.c2 ? out : undefined;
}

function emptyResult(): ParsedFormula {
  return { references: [], direct: [], external: [], errorTokens: [], functions: [] };
}

/**
 * Resolve every cell a formula reads. Ranges are expanded row-major,
 * whole rows/columns are bounded to the used range, references come back
 * de-duplicated in order of first appearance. A formula the tokenizer
 * rejects yields no references and a `warning`.
 */
export function parseFormula(formula: string, sheet: string, ctx: ParseContext): ParsedFormula {
  const out = emptyResult();
  try {
    collect(formula, sheet, ctx, out, 0);
  } catch (e) {
    if (!(e instanceof FormulaSyntaxError)) throw e;
    return { ...emptyResult(), warning: { formula, message: e.message, position: e.position } };
  }

  const seen = new Set<string>();
  out.references = out.references.filter(r => {
    const k = SheetModel.keyOf(r);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
  const seenDirect = new Set<string>();
  out.direct = out.direct.filter(r => {
    const k = SheetModel.keyOf(r);
    if (seenDirect.has(k)) return false;
    seenDirect.add(k);
    return true;
  });
  out.functions = [...new Set(out.functions)];
  out.errorTokens = [...new Set(out.errorTokens)];
  return out;
}

function collect(formula: string, sheet: string, ctx: ParseContext, out: ParsedFormula, depth: number) {
  for (const tok of tokenizeFormula(formula)) {
    switch (tok.type) {
      case 'function':
        out.functions.push(tok.name);
        break;
      case 'error':
        out.errorTokens.push(tok.value);
        break;
      case 'string': {
        const m = tok.value.match(EXTERNAL_TEXT_RE);
        if (m && !isThisBook(ctx, m[1])) out.external.push({ book: m[1], text: tok.value });
        break;
      }
      case 'reference':
        addReference(tok.ref, tok.text, sheet, ctx, out, depth > 0);
        break;
      case 'name':
        resolveName(tok.text, sheet, ctx, out, depth);
        break;
      default:
        break;
    }
  }
}

function isThisBook(ctx: ParseContext, book: string) {
  return !!ctx.bookName && ctx.bookName.toLowerCase() === book.toLowerCase();
}

function addReference(spec: RefSpec, text: string, current: string, ctx: ParseContext, out: ParsedFormula, viaName: boolean) {
  if (spec.book && !isThisBook(ctx, spec.book)) {
    out.external.push({ book: spec.book, path: spec.path, sheet: spec.sheet, text });
    return;
  }
  if (!spec.area) return;
  for (const sheet of sheetsFor(ctx, spec, current)) {
    const used = ctx.usedRange(sheet);
    const rect = rectFor(spec.area, used);
    const bounded = rect && clip(rect, used, ctx.maxRangeCells);
    if (!bounded) continue;
    for (let row = bounded.r1; row <= bounded.r2; row++) {
      for (let col = bounded.c1; col <= bounded.c2; col++) out.references.push({ sheet, row, col });
    }
    if (spec.area.kind === 'cell' && !viaName) out.direct.push({ sheet, row: spec.area.row, col: spec.area.col });
  }
}

function resolveName(text: string, sheet: string, ctx: ParseContext, out: ParsedFormula, depth: number) {
  if (depth >= MAX_NAME_DEPTH) return;
  const bang = text.lastIndexOf('!');
  const scope = bang > 0 ? canonicalSheet(ctx, text.slice(0, bang).replace(/^'|'$/g, '')) : sheet;
  const name = (bang > 0 ? text.slice(bang + 1) : text).toUpperCase();
  const target = ctx.names.get(`${scope}!${name}`) ?? ctx.names.get(name);
  if (!target) return; // unknown names (LAMBDA parameters, table columns) stay opaque
  try {
    collect(target.startsWith('=') ? target : `=${target}`, scope, ctx, out, depth + 1);
  } catch (e) {
    // a malformed name definition does not make the formula using it unreadable
    if (!(e instanceof FormulaSyntaxError)) throw e;
  }
}
