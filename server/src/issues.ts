import { createHash } from 'crypto';

import { explain } from './explanations.js';
import { SheetModel, compareRefs } from './sheet.js';
import type { CellKey, CellRef, ErrorToken, Evidence, Issue, IssueKind, Severity } from './types.js';

export const MESSAGES = {
  plug: 'Hard-coded value {value} at {cell} in a row of {formulas} formulas; the row pattern implies {expected}',
  plugNoPattern: 'Hard-coded value {value} at {cell} in a row of {formulas} formulas',
  imbalance: 'Balance sheet does not balance in {period}: assets {assets} vs liabilities + equity {liabilitiesAndEquity} (delta {delta})',
  errorValue: '{cell} evaluates to {error}{downstream}',
  inheritedError: '{cell} evaluates to {error}, inherited from {source}',
  refInFormula: 'Formula at {cell} contains a {error} reference',
  dangling: 'Formula at {cell} references {target}, which {reason}',
  external: 'Formula at {cell} links to external workbook {book}',
  cycle: 'Circular reference through {count} cell(s): {cells}',
  orphan: '{count} formula cell(s) at {cells} neither read nor feed any other cell'
} as const;

export function render(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (m, k: string) => (k in vars ? String(vars[k]) : m));
}

export function formatNumber(n: number): string {
  return Number.isInteger(n) ? String(n) : String(Math.round(n * 10000) / 10000);
}

/** Stable across runs: the kind plus the primary evidence coordinate. */
export function issueId(kind: IssueKind, primary: CellRef): string {
  return createHash('sha1').update(`${kind}|${SheetModel.keyOf(primary)}`).digest('hex').slice(0, 16);
}

export function evidenceFor(view: SheetModel, ref: CellRef, note?: string): Evidence {
  const ev: Evidence = { ref, address: SheetModel.address(ref), value: view.value(ref), formula: view.formula(ref) };
  if (note) ev.note = note;
  return ev;
}

export function makeIssue(args: {
  kind: IssueKind;
  severity: Severity;
  message: string;
  evidence: Evidence[];
  details?: Record<string, string | number>;
  error?: ErrorToken;
}): Issue {
  const primary = args.evidence[0];
  if (!primary) throw new Error(`Issue ${args.kind} needs at least one evidence cell`);
  return {
    id: issueId(args.kind, primary.ref),
    kind: args.kind,
    severity: args.severity,
    message: args.message,
    evidence: args.evidence,
    confidence: 'normal',
    details: args.details ?? {},
    explanation: explain(args.kind, args.error)
  };
}

export const SEVERITY_RANK: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3, info: 4 };

const KIND_ORDER: IssueKind[] = [
  'balance-sheet-imbalance',
  'circular-reference',
  'broken-reference',
  'hard-coded-plug',
  'external-reference',
  'orphaned-region'
];

export function compareIssues(a: Issue, b: Issue): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind) ||
    compareRefs(a.evidence[0].ref, b.evidence[0].ref) ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * Concatenate detector output, keep the first issue per id, lower the
 * confidence of issues that touch a cell whose formula could not be parsed,
 * and sort.
 */
export function mergeIssues(lists: readonly Issue[][], unparsed: ReadonlySet<CellKey> = new Set()): Issue[] {
  const byId = new Map<string, Issue>();
  for (const list of lists) {
    for (const issue of list) if (!byId.has(issue.id)) byId.set(issue.id, issue);
  }
  const merged = [...byId.values()].map(issue =>
    issue.evidence.some(e => unparsed.has(SheetModel.keyOf(e.ref))) ? { ...issue, confidence: 'reduced' as const } : issue
  );
  return merged.sort(compareIssues);
}
