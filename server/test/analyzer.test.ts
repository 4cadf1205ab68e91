import { describe, expect, it } from 'vitest';

import { GraphAnalyzer } from '../src/analyzer.js';
import { buildDependencyGraph } from '../src/graph.js';
import { CYCLE, type SheetSpec, snapshotOf } from './helpers.js';

function analyze(sheets: Record<string, SheetSpec>) {
  const snapshot = snapshotOf(sheets);
  const graph = buildDependencyGraph(snapshot);
  return { graph, analyzer: new GraphAnalyzer(graph, snapshot.sheetNames) };
}

// A1 -> A2 -> A3 -> A4, A1 -> A4, plus an isolated B5
const CHAIN: Record<string, SheetSpec> = {
  Sheet1: {
    A1: 5,
    A2: { f: '=A1*2', v: 10 },
    A3: { f: '=A2+1', v: 11 },
    A4: { f: '=A3+A1', v: 16 },
    B5: { f: '=1+2', v: 3 }
  }
};

describe('GraphAnalyzer', () => {
  it('finds the two-cell loop as one cycle', () => {
    const { analyzer } = analyze(CYCLE);
    expect(analyzer.detectCycles()).toEqual([[0, 1]]);
    expect(analyzer.inCycle(0)).toBe(true);
    expect(analyzer.depth(0)).toBeNull();
  });

  it('finds no cycle in an acyclic chain', () => {
    const { analyzer } = analyze(CHAIN);
    expect(analyzer.detectCycles()).toEqual([]);
  });

  it('treats a range covering its own cell as a self-loop', () => {
    const { analyzer } = analyze({ Sheet1: { A1: { f: '=SUM(A1:A3)', v: 5 }, A2: 2, A3: 3 } });
    expect(analyzer.detectCycles()).toEqual([[0]]);
  });

  it('measures depth as the longest path from an input', () => {
    const { analyzer } = analyze(CHAIN);
    expect([0, 1, 2, 3].map(id => analyzer.depth(id))).toEqual([0, 1, 2, 3]);
  });

  it('ignores cyclic precedents when measuring depth', () => {
    const { analyzer } = analyze({ Sheet1: { ...CYCLE.Sheet1, C1: { f: '=A1*2', v: 0 } } });
    expect(analyzer.depth(2)).toBe(0);
  });

  it('classifies orphans, leaf inputs and terminal outputs', () => {
    const { analyzer } = analyze(CHAIN);
    expect(analyzer.findOrphans()).toEqual([4]);
    expect(analyzer.leafInputs()).toEqual([0]);
    expect(analyzer.terminalOutputs()).toEqual([3, 4]);
  });

  it('summarizes the graph', () => {
    const { analyzer } = analyze(CHAIN);
    expect(analyzer.stats()).toEqual({
      sheetCount: 1,
      totalCells: 5,
      formulaCells: 4,
      literalCells: 1,
      errorCells: 0,
      formulaDensity: 0.8,
      nodeCount: 5,
      edgeCount: 4,
      missingCount: 0,
      maxDepth: 3,
      crossSheetEdges: 0,
      crossSheetEdgeRatio: 0,
      maxFanIn: 2,
      maxFanOut: 2,
      avgFanIn: 1,
      cycleCount: 0,
      orphanCount: 1,
      leafInputs: 1,
      terminalOutputs: 2
    });
  });

  it('counts cross-sheet edges and sheets without cells', () => {
    const snapshot = snapshotOf({ Inputs: { A1: 3 }, Calc: { A1: { f: '=Inputs!A1*2', v: 6 } }, Notes: {} });
    const graph = buildDependencyGraph(snapshot);
    const stats = new GraphAnalyzer(graph, snapshot.sheetNames).stats();
    expect(stats.sheetCount).toBe(3);
    expect(stats.crossSheetEdges).toBe(1);
    expect(stats.crossSheetEdgeRatio).toBe(1);
  });
});
