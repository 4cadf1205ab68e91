import type { ComplexityScore, GraphStats } from './types.js';

const METRICS = ['sheetCount', 'formulaCells', 'formulaDensity', 'maxDepth', 'crossSheetEdgeRatio'] as const;
type Metric = (typeof METRICS)[number];

const LABELS: Record<Metric, string> = {
  sheetCount: 'sheet count',
  formulaCells: 'formula cells',
  formulaDensity: 'formula density',
  maxDepth: 'dependency depth',
  crossSheetEdgeRatio: 'cross-sheet link ratio'
};

// A tier wins when any of its breakpoints is exceeded; checked from 5 down.
const TIERS: { score: 2 | 3 | 4 | 5; over: Partial<Record<Metric, number>> }[] = [
  { score: 5, over: { sheetCount: 30, formulaCells: 10_000, maxDepth: 50, crossSheetEdgeRatio: 0.6 } },
  { score: 4, over: { sheetCount: 20, formulaCells: 5_000, maxDepth: 30, crossSheetEdgeRatio: 0.45 } },
  { score: 3, over: { sheetCount: 10, formulaCells: 2_000, formulaDensity: 0.8, maxDepth: 15, crossSheetEdgeRatio: 0.3 } },
  { score: 2, over: { sheetCount: 3, formulaCells: 200, formulaDensity: 0.5, maxDepth: 5, crossSheetEdgeRatio: 0.1 } }
];

function show(metric: Metric, n: number): string {
  return metric === 'formulaDensity' || metric === 'crossSheetEdgeRatio' ? `${Math.round(n * 100)}%` : String(n);
}

/** 1 (simple) to 5 (very complex) from graph statistics; absent statistics count as low. */
export function scoreComplexity(stats: Partial<GraphStats> = {}): ComplexityScore {
  for (const tier of TIERS) {
    const drivers: string[] = [];
    for (const metric of METRICS) {
      const limit = tier.over[metric];
      const value = stats[metric];
      if (limit !== undefined && typeof value === 'number' && Number.isFinite(value) && value > limit) {
        drivers.push(`${LABELS[metric]} ${show(metric, value)} > ${show(metric, limit)}`);
      }
    }
    if (drivers.length) return { score: tier.score, drivers };
  }
  return { score: 1, drivers: [] };
}
