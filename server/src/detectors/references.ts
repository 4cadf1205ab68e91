import { MESSAGES, evidenceFor, makeIssue, render } from '../issues.js';
import { SheetModel } from '../sheet.js';
import type { ErrorToken, Evidence, Issue } from '../types.js';
import type { AuditContext, Detector, DetectorResult } from './types.js';

const MAX_LISTED_FORMULAS = 10;

/** Error-valued cells reachable from `root` through error-valued dependents. */
function downstreamErrors(ctx: AuditContext, root: number): number {
  const seen = new Set<number>([root]);
  const queue = [root];
  for (let head = 0; head < queue.length; head++) {
    for (const s of ctx.graph.successors(queue[head])) {
      if (seen.has(s) || !ctx.graph.node(s).isError) continue;
      seen.add(s);
      queue.push(s);
    }
  }
  return seen.size - 1;
}

// Members of one cycle feed each other, so none of them is the source of the others' error.
function errorSource(ctx: AuditContext, id: number): number | undefined {
  return ctx.graph
    .predecessors(id)
    .find(p => ctx.graph.node(p).isError && !ctx.analyzer.sameComponent(p, id));
}

function errorIssues(ctx: AuditContext): Issue[] {
  const { graph, view } = ctx;
  const out: Issue[] = [];
  for (const node of graph.nodes) {
    if (node.missing) continue;
    const value = view.value(node.ref);
    const token: ErrorToken | undefined = value.kind === 'error' ? value.value : undefined;
    const refInText = graph.parsed(node.id)?.errorTokens.includes('#REF!') ?? false;
    if (!token && !refInText) continue;

    const cell = SheetModel.address(node.ref);
    const source = token && !refInText ? errorSource(ctx, node.id) : undefined;
    if (token && source !== undefined) {
      const from = graph.node(source).ref;
      out.push(makeIssue({
        kind: 'broken-reference',
        severity: 'medium',
        message: render(MESSAGES.inheritedError, { cell, error: token, source: SheetModel.address(from) }),
        evidence: [evidenceFor(view, node.ref, token), evidenceFor(view, from, 'error source')],
        details: { error: token, inheritedFrom: SheetModel.address(from) },
        error: token
      }));
      continue;
    }

    const downstream = token ? downstreamErrors(ctx, node.id) : 0;
    const message = refInText
      ? render(MESSAGES.refInFormula, { cell, error: '#REF!' })
      : render(MESSAGES.errorValue, {
          cell,
          error: token ?? '',
          downstream: downstream ? ` (${downstream} dependent cell(s) inherit it)` : ''
        });
    const details: Record<string, string | number> = { downstreamErrors: downstream };
    if (token) details.error = token;
    out.push(makeIssue({
      kind: 'broken-reference',
      severity: 'high',
      message,
      evidence: [evidenceFor(view, node.ref, token ?? '#REF! in formula')],
      details,
      error: refInText ? '#REF!' : token
    }));
  }
  return out;
}

function referencingFormulas(ctx: AuditContext, id: number): Evidence[] {
  return ctx.graph
    .successors(id)
    .slice(0, MAX_LISTED_FORMULAS)
    .map(s => evidenceFor(ctx.view, ctx.graph.node(s).ref, 'references it'));
}

function danglingIssues(ctx: AuditContext): Issue[] {
  const { graph, view } = ctx;
  const sheets = new Set(ctx.snapshot.sheetNames);
  const out: Issue[] = [];
  const bySheet = new Map<string, number[]>();

  for (const node of graph.nodes) {
    if (!node.missing) continue;
    if (!sheets.has(node.ref.sheet)) {
      const ids = bySheet.get(node.ref.sheet);
      if (ids) ids.push(node.id); else bySheet.set(node.ref.sheet, [node.id]);
      continue;
    }
    // an empty cell inside a referenced range is ordinary
    if (!node.directlyReferenced) continue;
    const formulas = referencingFormulas(ctx, node.id);
    const first = formulas[0];
    if (!first) continue;
    out.push(makeIssue({
      kind: 'broken-reference',
      severity: 'medium',
      message: render(MESSAGES.dangling, { cell: first.address, target: SheetModel.address(node.ref), reason: 'is empty' }),
      evidence: [evidenceFor(view, node.ref, 'missing'), ...formulas],
      details: { referencedBy: graph.successors(node.id).length }
    }));
  }

  // one issue per absent sheet, anchored on its first referenced cell
  for (const [sheet, ids] of bySheet) {
    const formulaIds = [...new Set(ids.flatMap(id => graph.successors(id)))].sort((a, b) => a - b);
    const formulas = formulaIds.slice(0, MAX_LISTED_FORMULAS).map(s => evidenceFor(view, graph.node(s).ref, 'references it'));
    const anchor = graph.node(ids[0]);
    out.push(makeIssue({
      kind: 'broken-reference',
      severity: 'high',
      message: render(MESSAGES.dangling, {
        cell: formulas[0]?.address ?? SheetModel.address(anchor.ref),
        target: SheetModel.address(anchor.ref),
        reason: `is on missing sheet '${sheet}'`
      }),
      evidence: [evidenceFor(view, anchor.ref, 'missing sheet'), ...formulas],
      details: { sheet, missingCells: ids.length, referencedBy: formulaIds.length }
    }));
  }
  return out;
}

function externalIssues(ctx: AuditContext): Issue[] {
  const out: Issue[] = [];
  for (const id of ctx.graph.formulaIds()) {
    const external = ctx.graph.parsed(id)?.external ?? [];
    if (!external.length) continue;
    const node = ctx.graph.node(id);
    const books = [...new Set(external.map(e => e.book))];
    out.push(makeIssue({
      kind: 'external-reference',
      severity: 'medium',
      message: render(MESSAGES.external, { cell: SheetModel.address(node.ref), book: books.join(', ') }),
      evidence: [evidenceFor(ctx.view, node.ref, external[0].text)],
      details: { books: books.join(', '), links: external.length }
    }));
  }
  return out;
}

// Value-only inputs still get the error-value pass; the other two find nothing without formulas.
export const referenceDetector: Detector = {
  name: 'broken-reference',
  needsFormulas: false,
  run(ctx: AuditContext): DetectorResult {
    return { issues: [...errorIssues(ctx), ...danglingIssues(ctx), ...externalIssues(ctx)], diagnostics: [] };
  }
};

