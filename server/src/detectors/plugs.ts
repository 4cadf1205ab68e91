import { MESSAGES, evidenceFor, formatNumber, makeIssue, render } from '../issues.js';
import { detectProjectionRegion, matchesWord } from '../labels.js';
import { SheetModel } from '../sheet.js';
import type { CellRecord, Diagnostic, Issue } from '../types.js';
import type { AuditContext, Detector, DetectorResult } from './types.js';

const MIN_FORMULAS = 3;
const REL_TOLERANCE = 0.005;
const ABS_TOLERANCE = 0.01;

type Point = { pos: number; value: number };

function median(xs: number[]): number | undefined {
  if (!xs.length) return undefined;
  const s = [...xs].sort((a, b) => a - b);
  const mid = Math.floor(s.length / 2);
  return s.length % 2 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

/**
 * Values a naive continuation of the row would put at position `pos`:
 * constant step (median difference) and constant growth (median ratio),
 * projected from the nearest point before it, or back from the nearest
 * point after it.
 */
export function continuationCandidates(points: readonly Point[], pos: number): number[] {
  if (points.length < 2) return [];
  const diffs: number[] = [];
  const ratios: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const steps = points[i].pos - points[i - 1].pos;
    diffs.push((points[i].value - points[i - 1].value) / steps);
    if (points[i - 1].value !== 0) ratios.push(Math.pow(points[i].value / points[i - 1].value, 1 / steps));
  }

  const before = [...points].reverse().find(p => p.pos < pos);
  const anchor = before ?? points.find(p => p.pos > pos);
  if (!anchor) return [];
  const steps = pos - anchor.pos;

  const out: number[] = [];
  const d = median(diffs);
  if (d !== undefined) out.push(anchor.value + d * steps);
  const r = median(ratios);
  if (r !== undefined && r > 0) out.push(anchor.value * Math.pow(r, steps));
  return out;
}

const matches = (value: number, expected: number) =>
  Math.abs(value - expected) <= Math.max(ABS_TOLERANCE, REL_TOLERANCE * Math.abs(expected));

function numericValue(rec: CellRecord): number | undefined {
  return rec.value.kind === 'number' ? rec.value.value : undefined;
}

// Columns holding row labels: text left of every number or formula in its row.
function labelColumns(rows: Map<number, CellRecord[]>): Set<number> {
  const out = new Set<number>();
  for (const cells of rows.values()) {
    const data = cells.filter(c => c.formula !== null || c.value.kind === 'number');
    if (!data.length) continue;
    const firstData = Math.min(...data.map(c => c.ref.col));
    for (const c of cells) if (c.value.kind === 'text' && c.ref.col < firstData) out.add(c.ref.col);
  }
  return out;
}

function headerCells(rows: Map<number, CellRecord[]>, maxRow: number) {
  const labels = labelColumns(rows);
  const out: { row: number; col: number; text: string }[] = [];
  for (const [row, cells] of rows) {
    if (row > maxRow) break;
    for (const c of cells) {
      if (c.value.kind === 'text' && !labels.has(c.ref.col)) out.push({ row, col: c.ref.col, text: c.value.value });
    }
  }
  return out;
}

function scanSheet(ctx: AuditContext, sheet: string, issues: Issue[], diagnostics: Diagnostic[]) {
  const rows = ctx.view.rows(sheet);
  const region = detectProjectionRegion(headerCells(rows, ctx.policy.headerScanRows), ctx.policy);
  if (!region) {
    const hasFormulas = [...rows.values()].some(cells => cells.some(c => c.formula !== null));
    if (hasFormulas) {
      diagnostics.push({
        level: 'info',
        code: 'no-projection-region',
        message: `No historical/projection headers found on '${sheet}'; hard-coded plug check skipped for this sheet`
      });
    }
    return;
  }

  for (const [row, cells] of rows) {
    if (row <= region.headerRow) continue;
    const projection = cells.filter(c => c.ref.col >= region.startCol && (c.formula !== null || c.value.kind === 'number'));
    const formulas = projection.filter(c => c.formula !== null);
    const literals = projection.filter(c => c.formula === null);
    // single-column rows carry no pattern to compare against
    if (projection.length < 2 || formulas.length < MIN_FORMULAS || literals.length === 0 || formulas.length <= literals.length) continue;

    for (const lit of literals) {
      const value = numericValue(lit);
      if (value === undefined) continue;
      const points: Point[] = [];
      projection.forEach((c, pos) => {
        const v = numericValue(c);
        if (c !== lit && v !== undefined) points.push({ pos, value: v });
      });
      const candidates = continuationCandidates(points, projection.indexOf(lit));
      if (candidates.some(e => matches(value, e))) continue;

      const closest = candidates.reduce<number | undefined>(
        (best, e) => (best === undefined || Math.abs(e - value) < Math.abs(best - value) ? e : best),
        undefined
      );
      const cell = SheetModel.address(lit.ref);
      const vars = { value: formatNumber(value), cell, formulas: formulas.length };
      const message = closest === undefined
        ? render(MESSAGES.plugNoPattern, vars)
        : render(MESSAGES.plug, { ...vars, expected: `about ${formatNumber(closest)}` });

      const litIndex = projection.indexOf(lit);
      const prevFormula = [...projection.slice(0, litIndex)].reverse().find(c => c.formula !== null);
      const nextFormula = projection.slice(litIndex + 1).find(c => c.formula !== null);
      const evidence = [evidenceFor(ctx.view, lit.ref, 'hard-coded')];
      if (prevFormula) evidence.push(evidenceFor(ctx.view, prevFormula.ref, 'preceding formula'));
      if (nextFormula) evidence.push(evidenceFor(ctx.view, nextFormula.ref, 'following formula'));

      const details: Record<string, string | number> = {
        formulas: formulas.length,
        literals: literals.length,
        projectionStart: SheetModel.columnLetters(region.startCol)
      };
      if (closest !== undefined) details.expected = closest;
      issues.push(makeIssue({ kind: 'hard-coded-plug', severity: 'high', message, evidence, details }));
    }
  }
}

export const plugDetector: Detector = {
  name: 'hard-coded-plug',
  needsFormulas: true,
  run(ctx: AuditContext): DetectorResult {
    const issues: Issue[] = [];
    const diagnostics: Diagnostic[] = [];
    for (const sheet of ctx.snapshot.sheetNames) {
      if (matchesWord(sheet, ctx.policy.excludedSheets)) continue;
      scanSheet(ctx, sheet, issues, diagnostics);
    }
    return { issues, diagnostics };
  }
};
