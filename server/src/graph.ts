import { parseContextFor, parseFormula } from './formula.js';
import { createLogger } from './logger.js';
import { SheetModel, compareRefs } from './sheet.js';
import type { CellKey, CellRef, ParseWarning, ParsedFormula, WorkbookSnapshot } from './types.js';

const log = createLogger('graph');

export type GraphNode = {
  readonly id: number;
  readonly ref: CellRef;
  readonly key: CellKey;
  readonly isFormula: boolean;
  readonly isLiteral: boolean;
  readonly isError: boolean;
  /** referenced by a formula but absent from the workbook */
  readonly missing: boolean;
  /** referenced somewhere as a single cell, not only as part of a range or name */
  readonly directlyReferenced: boolean;
  readonly warning?: ParseWarning;
};

type MutableNode = { -readonly [K in keyof GraphNode]: GraphNode[K] };

/**
 * Cell dependency graph. Nodes live in an arena indexed by integer id,
 * assigned in CellRef order (populated cells first, then dangling targets);
 * edges run dependency -> dependent and are stored as sorted adjacency lists.
 */
export class DependencyGraph {
  readonly edgeCount: number;

  constructor(
    readonly nodes: readonly GraphNode[],
    private readonly index: ReadonlyMap<CellKey, number>,
    private readonly succ: readonly (readonly number[])[],
    private readonly pred: readonly (readonly number[])[],
    private readonly formulas: ReadonlyMap<number, ParsedFormula>
  ) {
    this.edgeCount = succ.reduce((n, s) => n + s.length, 0);
  }

  get size() { return this.nodes.length; }

  node(id: number): GraphNode {
    const n = this.nodes[id];
    if (!n) throw new RangeError(`No graph node ${id}`);
    return n;
  }

  idOf(ref: CellRef): number | undefined {
    return this.index.get(SheetModel.keyOf(ref));
  }

  successors(id: number): readonly number[] { return this.succ[id] ?? []; }

  predecessors(id: number): readonly number[] { return this.pred[id] ?? []; }

  hasEdge(from: number, to: number): boolean {
    return this.successors(from).includes(to);
  }

  /** Parse result for a formula node. */
  parsed(id: number): ParsedFormula | undefined {
    return this.formulas.get(id);
  }

  formulaIds(): number[] {
    return [...this.formulas.keys()].sort((a, b) => a - b);
  }

  warnings(): { node: GraphNode; warning: ParseWarning }[] {
    const out: { node: GraphNode; warning: ParseWarning }[] = [];
    for (const node of this.nodes) if (node.warning) out.push({ node, warning: node.warning });
    return out;
  }
}

export type GraphOptions = { maxRangeCells?: number };

export function buildDependencyGraph(snapshot: WorkbookSnapshot, options: GraphOptions = {}): DependencyGraph {
  const view = new SheetModel(snapshot);
  const ctx = parseContextFor(snapshot, options.maxRangeCells);
  const records = view.records();

  const nodes: MutableNode[] = [];
  const index = new Map<CellKey, number>();
  const parsedByKey = new Map<CellKey, ParsedFormula>();

  // Parsing is per cell and order-free; everything after it runs in CellRef order
  for (const rec of records) {
    const key = SheetModel.keyOf(rec.ref);
    const parsed = rec.formula ? parseFormula(rec.formula, rec.ref.sheet, ctx) : undefined;
    if (parsed) parsedByKey.set(key, parsed);
    index.set(key, nodes.length);
    nodes.push({
      id: nodes.length,
      ref: rec.ref,
      key,
      isFormula: rec.formula !== null,
      isLiteral: rec.kind === 'Literal',
      isError: rec.kind === 'Error',
      missing: false,
      directlyReferenced: false,
      warning: parsed?.warning
    });
  }

  const dangling = new Map<CellKey, CellRef>();
  for (const parsed of parsedByKey.values()) {
    for (const ref of parsed.references) {
      const key = SheetModel.keyOf(ref);
      if (!index.has(key)) dangling.set(key, ref);
    }
  }
  for (const ref of [...dangling.values()].sort(compareRefs)) {
    const key = SheetModel.keyOf(ref);
    index.set(key, nodes.length);
    nodes.push({
      id: nodes.length, ref, key,
      isFormula: false, isLiteral: false, isError: false,
      missing: true, directlyReferenced: false
    });
  }

  const succ: Set<number>[] = nodes.map(() => new Set());
  const pred: Set<number>[] = nodes.map(() => new Set());
  const formulas = new Map<number, ParsedFormula>();

  for (const [key, parsed] of parsedByKey) {
    const to = index.get(key);
    if (to === undefined) continue;
    formulas.set(to, parsed);
    for (const ref of parsed.references) {
      const from = index.get(SheetModel.keyOf(ref));
      if (from === undefined) continue;
      succ[from].add(to);
      pred[to].add(from);
    }
    for (const ref of parsed.direct) {
      const id = index.get(SheetModel.keyOf(ref));
      if (id !== undefined) nodes[id].directlyReferenced = true;
    }
  }

  const sorted = (sets: Set<number>[]) => sets.map(s => [...s].sort((a, b) => a - b));
  const graph = new DependencyGraph(nodes, index, sorted(succ), sorted(pred), formulas);

  const warned = nodes.filter(n => n.warning).length;
  log.info(`${graph.size} node(s), ${graph.edgeCount} edge(s), ${dangling.size} dangling, ${warned} unparsed formula(s)`);
  for (const n of nodes) if (n.warning) log.debug(`parse warning at ${n.key}: ${n.warning.message}`);
  return graph;
}
