import { MESSAGES, evidenceFor, makeIssue, render } from '../issues.js';
import { SheetModel } from '../sheet.js';
import type { CellRef, Issue } from '../types.js';
import type { AuditContext, Detector, DetectorResult } from './types.js';

const MAX_LISTED_CELLS = 8;

function listCells(refs: readonly CellRef[]): string {
  const shown = refs.slice(0, MAX_LISTED_CELLS).map(r => SheetModel.address(r)).join(', ');
  const more = refs.length - MAX_LISTED_CELLS;
  return more > 0 ? `${shown} and ${more} more` : shown;
}

function cycleIssues(ctx: AuditContext): Issue[] {
  return ctx.analyzer.detectCycles().map(cycle => {
    const refs = cycle.map(id => ctx.graph.node(id).ref);
    return makeIssue({
      kind: 'circular-reference',
      severity: 'high',
      message: render(MESSAGES.cycle, { count: refs.length, cells: listCells(refs) }),
      evidence: refs.map(ref => evidenceFor(ctx.view, ref)),
      details: { size: refs.length }
    });
  });
}

/** Orphan cells split into runs of adjacent columns on one row. */
export function orphanRuns(refs: readonly CellRef[]): CellRef[][] {
  const runs: CellRef[][] = [];
  let run: CellRef[] = [];
  for (const ref of refs) {
    const prev = run[run.length - 1];
    if (prev && (prev.sheet !== ref.sheet || prev.row !== ref.row || prev.col + 1 !== ref.col)) {
      runs.push(run);
      run = [];
    }
    run.push(ref);
  }
  if (run.length) runs.push(run);
  return runs;
}

function orphanIssues(ctx: AuditContext): Issue[] {
  // node ids follow CellRef order, so the refs arrive sorted
  const refs = ctx.analyzer.findOrphans().map(id => ctx.graph.node(id).ref);
  return orphanRuns(refs).map(run => {
    const first = run[0];
    const last = run[run.length - 1];
    const cells = run.length === 1
      ? SheetModel.address(first)
      : `${SheetModel.address(first)}:${SheetModel.rcToA1(last.row, last.col)}`;
    return makeIssue({
      kind: 'orphaned-region',
      severity: 'low',
      message: render(MESSAGES.orphan, { count: run.length, cells }),
      evidence: run.map(ref => evidenceFor(ctx.view, ref)),
      details: { count: run.length, range: cells }
    });
  });
}

export const structureDetector: Detector = {
  name: 'structure',
  needsFormulas: true,
  run(ctx: AuditContext): DetectorResult {
    return { issues: [...cycleIssues(ctx), ...orphanIssues(ctx)], diagnostics: [] };
  }
};
