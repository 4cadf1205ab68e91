/** 1-based coordinate of one workbook cell. Identity is the (sheet, row, col) triple. */
export type CellRef = { sheet: string; row: number; col: number };

/** Canonical string form of a CellRef, e.g. `Balance Sheet!C12`. */
export type CellKey = string;

export const ERROR_TOKENS = [
  '#NULL!',
  '#DIV/0!',
  '#VALUE!',
  '#REF!',
  '#NAME?',
  '#NUM!',
  '#N/A',
  '#GETTING_DATA',
  '#SPILL!',
  '#CALC!'
] as const;

export type ErrorToken = (typeof ERROR_TOKENS)[number];

export type TypedValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'error'; value: ErrorToken }
  | { kind: 'empty' };

export type CellKind = 'Literal' | 'Formula' | 'Error';

export type CellRecord = {
  ref: CellRef;
  value: TypedValue;
  formula: string | null; // literal formula string starting with '='
  kind: CellKind;
};

export type UsedRange = { minRow: number; maxRow: number; minCol: number; maxCol: number };

/** Immutable result of loading one workbook. */
export type WorkbookSnapshot = {
  source: string;
  sheetNames: string[];
  values: ReadonlyMap<CellKey, TypedValue>;
  formulas: ReadonlyMap<CellKey, string | null>;
  usedRanges: ReadonlyMap<string, UsedRange>;
  /** Defined names: upper-cased name (or `Sheet!NAME` for sheet-scoped ones) -> reference text */
  names: ReadonlyMap<string, string>;
  /** false for value-only inputs such as CSV */
  hasFormulas: boolean;
};

export type ExternalReference = {
  /** Workbook name or index as written between brackets, e.g. `Budget.xlsx` or `1` */
  book: string;
  path?: string;
  sheet?: string;
  text: string;
};

/** A formula the tokenizer could not read. The cell stays in the graph with no outgoing references. */
export type ParseWarning = { formula: string; message: string; position: number };

export type ParsedFormula = {
  references: CellRef[];
  /** Subset of `references` written as a single cell rather than through a range or name */
  direct: CellRef[];
  external: ExternalReference[];
  errorTokens: ErrorToken[];
  functions: string[];
  warning?: ParseWarning;
};

export type IssueKind =
  | 'hard-coded-plug'
  | 'balance-sheet-imbalance'
  | 'broken-reference'
  | 'external-reference'
  | 'circular-reference'
  | 'orphaned-region';

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export type Evidence = {
  ref: CellRef;
  address: string;
  value: TypedValue;
  formula: string | null;
  note?: string;
};

export type Explanation = { why: string; cause: string; fix: string };

export type Issue = {
  id: string;
  kind: IssueKind;
  severity: Severity;
  message: string;
  evidence: Evidence[];
  /** 'reduced' when any evidence cell carries a parse warning */
  confidence: 'normal' | 'reduced';
  details: Record<string, string | number>;
  explanation: Explanation;
};

export type Diagnostic = {
  level: 'info' | 'warning';
  code: string;
  message: string;
  ref?: CellRef;
};

export type GraphStats = {
  sheetCount: number;
  totalCells: number;
  formulaCells: number;
  literalCells: number;
  errorCells: number;
  formulaDensity: number;
  nodeCount: number;
  edgeCount: number;
  missingCount: number;
  maxDepth: number;
  crossSheetEdges: number;
  crossSheetEdgeRatio: number;
  maxFanIn: number;
  maxFanOut: number;
  avgFanIn: number;
  cycleCount: number;
  orphanCount: number;
  leafInputs: number;
  terminalOutputs: number;
};

export type ComplexityScore = {
  score: 1 | 2 | 3 | 4 | 5;
  drivers: string[];
};

export type AuditReport = {
  source: string;
  generatedFrom: 'workbook' | 'values-only';
  issues: Issue[];
  complexity: ComplexityScore;
  stats: GraphStats;
  diagnostics: Diagnostic[];
  summary: string;
};
