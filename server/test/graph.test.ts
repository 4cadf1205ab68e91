import { describe, expect, it } from 'vitest';

import { buildDependencyGraph } from '../src/graph.js';
import { SheetModel } from '../src/sheet.js';
import { snapshotOf } from './helpers.js';

const ref = (a1: string, sheet = 'Sheet1') => ({ sheet, ...SheetModel.a1ToRc(a1) });

describe('buildDependencyGraph', () => {
  const snapshot = snapshotOf({
    Sheet1: {
      A1: 1,
      A2: 2,
      B1: { f: '=A1+A2', v: 3 },
      B2: { f: '=B1*2+C9', v: 6 }
    }
  });
  const graph = buildDependencyGraph(snapshot);

  it('numbers populated cells in sheet, row, column order, then dangling targets', () => {
    expect(graph.nodes.map(n => n.key)).toEqual(['Sheet1!A1', 'Sheet1!B1', 'Sheet1!A2', 'Sheet1!B2', 'Sheet1!C9']);
  });

  it('has an edge from every resolved reference to its formula and no others', () => {
    for (const id of graph.formulaIds()) {
      const parsed = graph.parsed(id);
      const expected = (parsed?.references ?? []).map(r => graph.idOf(r)).sort((a, b) => (a ?? 0) - (b ?? 0));
      expect(graph.predecessors(id)).toEqual(expected);
    }
    expect(graph.edgeCount).toBe(4);
  });

  it('stores each edge on both sides', () => {
    const b1 = graph.idOf(ref('B1'));
    const a1 = graph.idOf(ref('A1'));
    expect(b1).toBe(1);
    expect(a1).toBe(0);
    expect(graph.successors(0)).toEqual([1]);
    expect(graph.hasEdge(0, 1)).toBe(true);
    expect(graph.hasEdge(1, 0)).toBe(false);
  });

  it('creates a missing node for a reference to an absent cell', () => {
    const c9 = graph.node(4);
    expect(c9).toMatchObject({ key: 'Sheet1!C9', missing: true, directlyReferenced: true, isFormula: false, isLiteral: false });
    expect(graph.successors(4)).toEqual([3]);
  });

  it('collapses repeated references to one edge', () => {
    const g = buildDependencyGraph(snapshotOf({ Sheet1: { A1: 5, B1: { f: '=A1+A1*A1', v: 30 } } }));
    expect(g.edgeCount).toBe(1);
  });

  it('keeps an unparseable formula as a node with a warning and no precedents', () => {
    const g = buildDependencyGraph(snapshotOf({ Sheet1: { A1: 5, B1: { f: '=SUM(A1', v: 0 } } }));
    const id = g.idOf(ref('B1'));
    expect(id).toBe(1);
    expect(g.node(1).warning?.message).toBe('Unbalanced "(" at position 7');
    expect(g.predecessors(1)).toEqual([]);
    expect(g.warnings().map(w => w.node.key)).toEqual(['Sheet1!B1']);
  });

  it('does not depend on the order cells were written in', () => {
    const a = buildDependencyGraph(snapshotOf({ S: { B1: { f: '=A1', v: 1 }, A1: 1, C1: { f: '=B1+A1', v: 2 } } }));
    const b = buildDependencyGraph(snapshotOf({ S: { C1: { f: '=B1+A1', v: 2 }, A1: 1, B1: { f: '=A1', v: 1 } } }));
    expect(a.nodes.map(n => n.key)).toEqual(b.nodes.map(n => n.key));
    expect(a.nodes.map(n => a.successors(n.id))).toEqual(b.nodes.map(n => b.successors(n.id)));
  });
});
