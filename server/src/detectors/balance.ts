import { MESSAGES, evidenceFor, formatNumber, makeIssue, render } from '../issues.js';
import { type TotalLine, classifyTotal, isBalanceSheetName } from '../labels.js';
import { SheetModel } from '../sheet.js';
import type { CellRecord, CellRef, Diagnostic, Issue } from '../types.js';
import type { AuditContext, Detector, DetectorResult } from './types.js';

type TotalRow = { row: number; labelCol: number; label: string };

function findSheet(ctx: AuditContext): string | undefined {
  const names = ctx.snapshot.sheetNames;
  if (ctx.balanceSheet) {
    const wanted = ctx.balanceSheet.toLowerCase();
    return names.find(n => n.toLowerCase() === wanted);
  }
  return names.find(n => isBalanceSheetName(n, ctx.policy));
}

/** First row carrying each total label within the leading label columns. */
function findTotals(ctx: AuditContext, rows: Map<number, CellRecord[]>) {
  const totals = new Map<TotalLine, TotalRow>();
  for (const [row, cells] of rows) {
    for (const c of cells) {
      if (c.ref.col > ctx.policy.labelScanCols) break;
      if (c.value.kind !== 'text') continue;
      const line = classifyTotal(c.value.value, ctx.policy);
      if (line && !totals.has(line)) totals.set(line, { row, labelCol: c.ref.col, label: c.value.value });
    }
  }
  return totals;
}

/** Period label for a column: first header text (or year number) above the totals. */
function periodLabel(ctx: AuditContext, sheet: string, col: number, belowRow: number): string {
  const last = Math.min(ctx.policy.headerScanRows, belowRow - 1);
  for (let row = 1; row <= last; row++) {
    const v = ctx.view.value({ sheet, row, col });
    if (v.kind === 'text' && v.value.trim()) return v.value.trim();
    if (v.kind === 'number') return formatNumber(v.value);
  }
  return `column ${SheetModel.columnLetters(col)}`;
}

export const balanceDetector: Detector = {
  name: 'balance-sheet-imbalance',
  needsFormulas: false,
  run(ctx: AuditContext): DetectorResult {
    const issues: Issue[] = [];
    const diagnostics: Diagnostic[] = [];

    const sheet = findSheet(ctx);
    if (!sheet) {
      diagnostics.push({
        level: 'info',
        code: 'balance-sheet-not-found',
        message: ctx.balanceSheet
          ? `Configured balance sheet '${ctx.balanceSheet}' is not in the workbook; balance check skipped`
          : 'No sheet looks like a balance sheet; balance check skipped'
      });
      return { issues, diagnostics };
    }

    const rows = ctx.view.rows(sheet);
    const totals = findTotals(ctx, rows);
    const assets = totals.get('assets');
    const combined = totals.get('liabilitiesAndEquity');
    const liabilities = totals.get('liabilities');
    const equity = totals.get('equity');
    if (!assets || (!combined && !(liabilities && equity))) {
      const missing = [
        !assets && 'total assets',
        !combined && !liabilities && 'total liabilities',
        !combined && !equity && 'total equity'
      ].filter((s): s is string => typeof s === 'string');
      diagnostics.push({
        level: 'info',
        code: 'balance-sheet-labels-not-found',
        message: `Balance sheet '${sheet}' has no ${missing.join(' / ')} row; balance check skipped`
      });
      return { issues, diagnostics };
    }

    const firstRow = Math.min(assets.row, combined?.row ?? Infinity, liabilities?.row ?? Infinity, equity?.row ?? Infinity);
    const at = (total: TotalRow, col: number): CellRef => ({ sheet, row: total.row, col });

    for (const cell of rows.get(assets.row) ?? []) {
      const col = cell.ref.col;
      if (col <= assets.labelCol || cell.value.kind !== 'number') continue;
      const a = cell.value.value;

      let other: number | undefined;
      const sides: TotalRow[] = [];
      if (combined) {
        other = ctx.view.numberAt(at(combined, col));
        sides.push(combined);
      } else if (liabilities && equity) {
        const l = ctx.view.numberAt(at(liabilities, col));
        const e = ctx.view.numberAt(at(equity, col));
        other = l !== undefined && e !== undefined ? l + e : undefined;
        sides.push(liabilities, equity);
      }
      if (other === undefined) continue;

      // cents, so float noise in the sum does not cross the tolerance
      const delta = Math.round((a - other) * 100) / 100;
      if (!(Math.abs(delta) > ctx.balanceTolerance)) continue;

      const period = periodLabel(ctx, sheet, col, firstRow);
      const message = render(MESSAGES.imbalance, {
        period,
        assets: formatNumber(a),
        liabilitiesAndEquity: formatNumber(other),
        delta: formatNumber(delta)
      });
      const evidence = [
        evidenceFor(ctx.view, cell.ref, assets.label),
        ...sides.map(side => evidenceFor(ctx.view, at(side, col), side.label))
      ];
      issues.push(makeIssue({
        kind: 'balance-sheet-imbalance',
        severity: 'critical',
        message,
        evidence,
        details: { period, assets: a, liabilitiesAndEquity: other, delta }
      }));
    }

    return { issues, diagnostics };
  }
};
