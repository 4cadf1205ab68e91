import { GraphAnalyzer } from './analyzer.js';
import { scoreComplexity } from './complexity.js';
import { balanceDetector } from './detectors/balance.js';
import { plugDetector } from './detectors/plugs.js';
import { referenceDetector } from './detectors/references.js';
import { structureDetector } from './detectors/structure.js';
import type { AuditContext, Detector } from './detectors/types.js';
import { buildDependencyGraph } from './graph.js';
import { mergeIssues } from './issues.js';
import { DEFAULT_POLICY, type LabelPolicy } from './labels.js';
import { type LoadOptions, loadWorkbook } from './loader.js';
import { createLogger } from './logger.js';
import { SheetModel } from './sheet.js';
import type { AuditReport, CellKey, Diagnostic, Issue, Severity, WorkbookSnapshot } from './types.js';

const log = createLogger('audit');

export const DETECTORS: readonly Detector[] = [balanceDetector, structureDetector, referenceDetector, plugDetector];

export const NO_ISSUES_SUMMARY = 'No structural issues found.';

export type AuditOptions = {
  balanceTolerance?: number;
  maxRangeCells?: number;
  balanceSheet?: string;
  policy?: LabelPolicy;
  detectors?: readonly Detector[];
};

function summarize(issues: readonly Issue[]): string {
  if (!issues.length) return NO_ISSUES_SUMMARY;
  const counts = new Map<Severity, number>();
  for (const i of issues) counts.set(i.severity, (counts.get(i.severity) ?? 0) + 1);
  const parts = (['critical', 'high', 'medium', 'low', 'info'] as const)
    .filter(s => counts.has(s))
    .map(s => `${counts.get(s)} ${s}`);
  return `${issues.length} structural issue(s) found: ${parts.join(', ')}.`;
}

/** Run every detector over a loaded snapshot. Deterministic for a given snapshot and options. */
export function auditSnapshot(snapshot: WorkbookSnapshot, options: AuditOptions = {}): AuditReport {
  const graph = buildDependencyGraph(snapshot, { maxRangeCells: options.maxRangeCells });
  const analyzer = new GraphAnalyzer(graph, snapshot.sheetNames);
  const ctx: AuditContext = {
    snapshot,
    view: new SheetModel(snapshot),
    graph,
    analyzer,
    policy: options.policy ?? DEFAULT_POLICY,
    balanceTolerance: options.balanceTolerance ?? 1,
    balanceSheet: options.balanceSheet
  };

  const diagnostics: Diagnostic[] = [];
  const lists: Issue[][] = [];
  for (const detector of options.detectors ?? DETECTORS) {
    if (detector.needsFormulas && !snapshot.hasFormulas) {
      diagnostics.push({
        level: 'info',
        code: 'values-only',
        message: `${detector.name} check skipped: ${snapshot.source} carries values only`
      });
      continue;
    }
    const result = detector.run(ctx);
    log.debug(`${detector.name}: ${result.issues.length} issue(s)`);
    lists.push(result.issues);
    diagnostics.push(...result.diagnostics);
  }

  const unparsed = new Set<CellKey>();
  for (const { node, warning } of graph.warnings()) {
    unparsed.add(node.key);
    diagnostics.push({
      level: 'warning',
      code: 'formula-parse-warning',
      message: `Could not parse formula at ${SheetModel.address(node.ref)} (${warning.message}); its references are not in the graph`,
      ref: node.ref
    });
  }

  const issues = mergeIssues(lists, unparsed);
  const stats = analyzer.stats();
  const complexity = scoreComplexity(stats);
  const summary = summarize(issues);
  log.info(`${snapshot.source}: ${summary} Complexity ${complexity.score}/5`);

  return {
    source: snapshot.source,
    generatedFrom: snapshot.hasFormulas ? 'workbook' : 'values-only',
    issues,
    complexity,
    stats,
    diagnostics,
    summary
  };
}

export async function auditWorkbook(filePath: string, options: AuditOptions & LoadOptions = {}): Promise<AuditReport> {
  const snapshot = await loadWorkbook(filePath, { requireFormulas: options.requireFormulas });
  return auditSnapshot(snapshot, options);
}

/** Issue list as handed to the narrative layer: plain JSON, one entry per issue. */
export function serializeIssues(report: AuditReport): string {
  return JSON.stringify(
    report.issues.map(i => ({
      id: i.id,
      kind: i.kind,
      severity: i.severity,
      confidence: i.confidence,
      message: i.message,
      cells: i.evidence.map(e => e.address),
      details: i.details,
      fix: i.explanation.fix
    })),
    null,
    2
  );
}
