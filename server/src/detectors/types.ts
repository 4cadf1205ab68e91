import type { GraphAnalyzer } from '../analyzer.js';
import type { DependencyGraph } from '../graph.js';
import type { LabelPolicy } from '../labels.js';
import type { SheetModel } from '../sheet.js';
import type { Diagnostic, Issue, WorkbookSnapshot } from '../types.js';

/** Read-only inputs shared by every detector in one audit run. */
export type AuditContext = {
  snapshot: WorkbookSnapshot;
  view: SheetModel;
  graph: DependencyGraph;
  analyzer: GraphAnalyzer;
  policy: LabelPolicy;
  balanceTolerance: number;
  /** Sheet to check for balance; found by name otherwise */
  balanceSheet?: string;
};

export type DetectorResult = { issues: Issue[]; diagnostics: Diagnostic[] };

export type Detector = {
  name: string;
  /** skipped for value-only inputs such as CSV */
  needsFormulas: boolean;
  run(ctx: AuditContext): DetectorResult;
};
