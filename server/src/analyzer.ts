import type { DependencyGraph } from './graph.js';
import type { GraphStats } from './types.js';

/** Node ids of one strongly-connected component (or self-loop), ascending. */
export type Cycle = readonly number[];

/**
 * Graph-theoretic queries over a built DependencyGraph. Components are found
 * once with an iterative Tarjan pass (no recursion, no elementary-cycle
 * enumeration) and every other query reuses them.
 */
export class GraphAnalyzer {
  private components?: number[][]; // reverse topological order: sinks first
  private componentOf?: Int32Array;
  private cyclic?: Uint8Array;
  private depths?: (number | null)[];

  constructor(private readonly graph: DependencyGraph, private readonly sheetNames: readonly string[] = []) {}

  private tarjan() {
    if (this.components) return;
    const g = this.graph;
    const n = g.size;
    const index = new Int32Array(n).fill(-1);
    const low = new Int32Array(n);
    const onStack = new Uint8Array(n);
    const stack: number[] = [];
    const components: number[][] = [];
    let counter = 0;

    for (let root = 0; root < n; root++) {
      if (index[root] !== -1) continue;
      const frames: { v: number; next: number }[] = [{ v: root, next: 0 }];
      index[root] = low[root] = counter++;
      stack.push(root); onStack[root] = 1;

      while (frames.length) {
        const frame = frames[frames.length - 1];
        const succs = g.successors(frame.v);
        if (frame.next < succs.length) {
          const w = succs[frame.next++];
          if (index[w] === -1) {
            index[w] = low[w] = counter++;
            stack.push(w); onStack[w] = 1;
            frames.push({ v: w, next: 0 });
          } else if (onStack[w]) {
            low[frame.v] = Math.min(low[frame.v], index[w]);
          }
          continue;
        }
        frames.pop();
        const v = frame.v;
        if (low[v] === index[v]) {
          const comp: number[] = [];
          let w: number;
          do {
            w = stack.pop() ?? v;
            onStack[w] = 0;
            comp.push(w);
          } while (w !== v);
          components.push(comp.sort((a, b) => a - b));
        }
        const parent = frames[frames.length - 1];
        if (parent) low[parent.v] = Math.min(low[parent.v], low[v]);
      }
    }

    const componentOf = new Int32Array(n);
    const cyclic = new Uint8Array(components.length);
    components.forEach((comp, c) => {
      for (const v of comp) componentOf[v] = c;
      // a self-loop, including a range that covers its own cell, is a one-node cycle
      cyclic[c] = comp.length > 1 || g.hasEdge(comp[0], comp[0]) ? 1 : 0;
    });
    this.components = components;
    this.componentOf = componentOf;
    this.cyclic = cyclic;
  }

  detectCycles(): Cycle[] {
    this.tarjan();
    const comps = this.components ?? [];
    const cyclic = this.cyclic ?? new Uint8Array();
    return comps.filter((_, c) => cyclic[c] === 1).sort((a, b) => a[0] - b[0]);
  }

  inCycle(id: number): boolean {
    this.tarjan();
    const c = this.componentOf?.[id];
    return c !== undefined && this.cyclic?.[c] === 1;
  }

  /** True when both nodes lie in the same strongly-connected component. */
  sameComponent(a: number, b: number): boolean {
    this.tarjan();
    const ca = this.componentOf?.[a];
    return ca !== undefined && ca === this.componentOf?.[b];
  }

  /** Formula cells with no precedents and no dependents. */
  findOrphans(): number[] {
    return this.graph.nodes
      .filter(n => n.isFormula && this.graph.predecessors(n.id).length === 0 && this.graph.successors(n.id).length === 0)
      .map(n => n.id);
  }

  /** Literal cells that feed at least one formula and read nothing themselves. */
  leafInputs(): number[] {
    return this.graph.nodes
      .filter(n => n.isLiteral && this.graph.predecessors(n.id).length === 0 && this.graph.successors(n.id).length > 0)
      .map(n => n.id);
  }

  /** Formula cells nothing else references. */
  terminalOutputs(): number[] {
    return this.graph.nodes
      .filter(n => n.isFormula && this.graph.successors(n.id).length === 0)
      .map(n => n.id);
  }

  /**
   * Longest path from a node without precedents; `null` inside a cycle.
   * Precedents that sit in a cycle do not contribute.
   */
  depth(id: number): number | null {
    if (!this.depths) {
      this.tarjan();
      const comps = this.components ?? [];
      const depths: (number | null)[] = new Array(this.graph.size).fill(null);
      for (let c = comps.length - 1; c >= 0; c--) {
        if (this.cyclic?.[c]) continue;
        const v = comps[c][0];
        let d = 0;
        for (const p of this.graph.predecessors(v)) {
          const dp = depths[p];
          if (dp !== null && dp !== undefined) d = Math.max(d, dp + 1);
        }
        depths[v] = d;
      }
      this.depths = depths;
    }
    return this.depths[id] ?? null;
  }

  stats(): GraphStats {
    const g = this.graph;
    let totalCells = 0, formulaCells = 0, literalCells = 0, errorCells = 0, missingCount = 0;
    let maxDepth = 0, crossSheetEdges = 0, maxFanIn = 0, maxFanOut = 0, formulaFanIn = 0;
    const sheets = new Set<string>(this.sheetNames);

    for (const n of g.nodes) {
      const fanIn = g.predecessors(n.id).length;
      const fanOut = g.successors(n.id).length;
      maxFanIn = Math.max(maxFanIn, fanIn);
      maxFanOut = Math.max(maxFanOut, fanOut);
      for (const s of g.successors(n.id)) if (g.node(s).ref.sheet !== n.ref.sheet) crossSheetEdges++;
      maxDepth = Math.max(maxDepth, this.depth(n.id) ?? 0);

      if (n.missing) { missingCount++; continue; }
      sheets.add(n.ref.sheet);
      totalCells++;
      if (n.isFormula) { formulaCells++; formulaFanIn += fanIn; }
      if (n.isLiteral) literalCells++;
      if (n.isError) errorCells++;
    }

    return {
      sheetCount: sheets.size,
      totalCells,
      formulaCells,
      literalCells,
      errorCells,
      formulaDensity: totalCells ? formulaCells / totalCells : 0,
      nodeCount: g.size,
      edgeCount: g.edgeCount,
      missingCount,
      maxDepth,
      crossSheetEdges,
      crossSheetEdgeRatio: g.edgeCount ? crossSheetEdges / g.edgeCount : 0,
      maxFanIn,
      maxFanOut,
      avgFanIn: formulaCells ? formulaFanIn / formulaCells : 0,
      cycleCount: this.detectCycles().length,
      orphanCount: this.findOrphans().length,
      leafInputs: this.leafInputs().length,
      terminalOutputs: this.terminalOutputs().length
    };
  }
}
