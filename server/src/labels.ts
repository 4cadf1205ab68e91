/**
 * Label-matching policy for the heuristic detectors. Every fuzzy match in the
 * audit goes through here: a label matches a list when its normalized text
 * contains one of the synonyms (case-insensitive substring).
 */

export type LabelPolicy = {
  balanceSheetNames: string[];
  /** Sheet-name tokens that must match as a whole word (`BS`) */
  balanceSheetTokens: string[];
  totalAssets: string[];
  totalLiabilities: string[];
  totalEquity: string[];
  totalLiabilitiesAndEquity: string[];
  historicalMarkers: string[];
  projectionMarkers: string[];
  /** Sheet-name words that mark data dumps, skipped by the plug detector */
  excludedSheets: string[];
  /** Header rows scanned for period markers */
  headerScanRows: number;
  /** Leading columns scanned for balance-sheet labels */
  labelScanCols: number;
};

export const DEFAULT_POLICY: LabelPolicy = {
  balanceSheetNames: ['balance sheet', 'balance', 'financial position'],
  balanceSheetTokens: ['bs'],
  totalAssets: ['total assets'],
  totalLiabilities: ['total liabilities'],
  totalEquity: [
    'total equity',
    "total shareholders' equity",
    'total shareholders equity',
    "total stockholders' equity",
    'total stockholders equity',
    "total shareholder's equity",
    'total owners equity'
  ],
  totalLiabilitiesAndEquity: [
    'total liabilities and equity',
    'total liabilities & equity',
    "total liabilities and shareholders' equity",
    'total liabilities and shareholders equity',
    "total liabilities and stockholders' equity",
    'total liabilities and stockholders equity',
    "total liabilities & shareholders' equity",
    "total liabilities & stockholders' equity"
  ],
  historicalMarkers: ['actual', 'historical', 'hist.', 'audited', 'reported'],
  projectionMarkers: ['forecast', 'projected', 'projection', 'estimate', 'budget', 'outlook', 'plan'],
  excludedSheets: ['raw', 'cache'],
  headerScanRows: 10,
  labelScanCols: 3
};

export function normalizeLabel(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

export function matchesAny(text: string, synonyms: readonly string[]): boolean {
  const norm = normalizeLabel(text);
  return synonyms.some(s => norm.includes(s));
}

/** Whole-word match, for short tokens that would over-match as substrings. */
export function matchesWord(text: string, words: readonly string[]): boolean {
  const parts = normalizeLabel(text).split(/[^a-z0-9]+/);
  return words.some(w => parts.includes(w));
}

export function isBalanceSheetName(name: string, policy: LabelPolicy = DEFAULT_POLICY): boolean {
  return matchesAny(name, policy.balanceSheetNames) || matchesWord(name, policy.balanceSheetTokens);
}

export type TotalLine = 'assets' | 'liabilities' | 'equity' | 'liabilitiesAndEquity';

/** Most specific total a label names; the combined line wins over its parts. */
export function classifyTotal(label: string, policy: LabelPolicy = DEFAULT_POLICY): TotalLine | undefined {
  if (matchesAny(label, policy.totalLiabilitiesAndEquity)) return 'liabilitiesAndEquity';
  if (matchesAny(label, policy.totalEquity)) return 'equity';
  if (matchesAny(label, policy.totalLiabilities)) {
    // "Total liabilities and equity" phrased in a way the combined list misses
    return normalizeLabel(label).includes('equity') ? 'liabilitiesAndEquity' : 'liabilities';
  }
  if (matchesAny(label, policy.totalAssets)) return 'assets';
  return undefined;
}

export type PeriodKind = 'historical' | 'projection';

// 2023A, FY24E, '25F, 2026P, 2027B
const PERIOD_SUFFIX_RE = /^(?:fy|cy)?\s*'?(\d{2}|\d{4})\s*([aefpb])$/i;
// longer text is a title or a note, not a column header
const MAX_MARKER_WORDS = 3;

/** Classify a column header as historical or projection, if it says either. */
export function classifyPeriodHeader(text: string, policy: LabelPolicy = DEFAULT_POLICY): PeriodKind | undefined {
  const norm = normalizeLabel(text);
  const m = norm.match(PERIOD_SUFFIX_RE);
  if (m) return m[2] === 'a' ? 'historical' : 'projection';
  if (norm.split(' ').length > MAX_MARKER_WORDS) return undefined;
  if (matchesAny(norm, policy.historicalMarkers)) return 'historical';
  if (matchesAny(norm, policy.projectionMarkers)) return 'projection';
  return undefined;
}

export type ProjectionRegion = {
  /** First column (1-based) of the projection region */
  startCol: number;
  lastHistoricalCol?: number;
  headerRow: number;
};

/**
 * Projection columns start right after the last historical header; with no
 * historical header, at the first projection header. `headers` is a list of
 * (row, col, text) cells from the top of the sheet.
 */
export function detectProjectionRegion(
  headers: readonly { row: number; col: number; text: string }[],
  policy: LabelPolicy = DEFAULT_POLICY
): ProjectionRegion | undefined {
  let lastHist: { row: number; col: number } | undefined;
  let firstProj: { row: number; col: number } | undefined;

  for (const h of headers) {
    if (h.row > policy.headerScanRows) continue;
    const kind = classifyPeriodHeader(h.text, policy);
    if (kind === 'historical' && (!lastHist || h.col > lastHist.col)) lastHist = h;
    if (kind === 'projection' && (!firstProj || h.col < firstProj.col)) firstProj = h;
  }

  if (lastHist) return { startCol: lastHist.col + 1, lastHistoricalCol: lastHist.col, headerRow: lastHist.row };
  if (firstProj) return { startCol: firstProj.col, headerRow: firstProj.row };
  return undefined;
}
