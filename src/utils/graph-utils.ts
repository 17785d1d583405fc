/**
 * Structural helpers shared by the ranker, the normalizer and the encoder
 */

import type { FlowsheetGraph, UnitOperation } from '../flowsheet-graph.js';
import { exchangerEnd } from '../tag-rules.js';

/**
 * Orders units by type, then index, then sub-index (a missing sub-index
 * sorts first). This is the numeric fallback of every tie-break.
 */
export function compareUnits(a: UnitOperation, b: UnitOperation): number {
  if (a.type !== b.type) {
    return a.type < b.type ? -1 : 1;
  }
  if (a.index !== b.index) {
    return a.index - b.index;
  }
  return (a.subIndex ?? 0) - (b.subIndex ?? 0);
}

export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Lexicographic comparison of number arrays; a proper prefix sorts first.
 */
export function compareNumberArrays(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Weakly connected components over material streams, as lists of unit ids
 * in insertion order. Components are listed in order of their first unit.
 */
export function weaklyConnectedComponents(graph: FlowsheetGraph): number[][] {
  const componentOf = new Map<number, number>();
  const components: number[][] = [];
  const order = new Map(graph.getUnits().map((u, i) => [u.id, i]));

  for (const unit of graph.getUnits()) {
    if (componentOf.has(unit.id)) continue;

    const label = components.length;
    const members: number[] = [];
    const stack = [unit.id];
    componentOf.set(unit.id, label);

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      members.push(current);
      const neighbours = [
        ...graph.getOutStreams(current, 'material').map(s => s.dst),
        ...graph.getInStreams(current, 'material').map(s => s.src)
      ];
      for (const next of neighbours) {
        if (!componentOf.has(next)) {
          componentOf.set(next, label);
          stack.push(next);
        }
      }
    }

    members.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
    components.push(members);
  }

  return components;
}

/**
 * Finds ordered unit pairs connected by more than one stream of the same kind.
 */
export function duplicateStreamPairs(graph: FlowsheetGraph): Array<[number, number]> {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const duplicates: Array<[number, number]> = [];

  for (const stream of graph.getStreams()) {
    const key = `${stream.kind}:${stream.src}->${stream.dst}`;
    if (seen.has(key) && !reported.has(key)) {
      reported.add(key);
      duplicates.push([stream.src, stream.dst]);
    }
    seen.add(key);
  }

  return duplicates;
}

/**
 * Groups units that together form one heat exchanger: units sharing a
 * non-null `clusterKey`, and units of one type acting as exchanger for the
 * same explicit heat-integration group.
 *
 * @returns the representative unit id of every unit's cluster
 */
export function exchangerClusters(
  graph: FlowsheetGraph,
  clusterKey: (unit: UnitOperation) => string | null
): Map<number, number> {
  const parent = new Map<number, number>();
  const find = (id: number): number => {
    let root = id;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    parent.set(id, root);
    return root;
  };
  const union = (a: number, b: number): void => {
    const ra = find(a);
    const rb = find(b);
    if (ra !== rb) parent.set(rb, ra);
  };

  const firstByKey = new Map<string, number>();
  const join = (key: string, unitId: number): void => {
    const first = firstByKey.get(key);
    if (first === undefined) firstByKey.set(key, unitId);
    else union(first, unitId);
  };

  for (const unit of graph.getUnits()) {
    const key = clusterKey(unit);
    if (key !== null) join(`unit:${key}`, unit.id);
  }
  for (const stream of graph.getStreams('material')) {
    for (const tag of stream.tags.heatIntegration) {
      if (tag.group === null) continue;
      const exchanger = exchangerEnd(tag, stream);
      join(`group:${tag.group}:${graph.getUnit(exchanger).type}`, exchanger);
    }
  }

  return new Map(graph.getUnits().map(unit => [unit.id, find(unit.id)]));
}

export function clusterSizes(clusters: Map<number, number>): Map<number, number> {
  const sizes = new Map<number, number>();
  for (const root of clusters.values()) {
    sizes.set(root, (sizes.get(root) ?? 0) + 1);
  }
  return sizes;
}
