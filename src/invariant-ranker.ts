/**
 * Morgan-style invariant ranking of flowsheet units
 */

import type { FlowsheetGraph, Stream } from './flowsheet-graph.js';
import { hasTags, tagBlockToString, tagsToEntries } from './tag-rules.js';
import { compareNumberArrays, compareStrings } from './utils/graph-utils.js';

type RankKey = [number[], string];

function compareKeys(a: RankKey, b: RankKey): number {
  return compareNumberArrays(a[0], b[0]) || compareStrings(a[1], b[1]);
}

/**
 * Assigns dense ranks (0, 1, ...) to the keyed units; equal keys share a rank.
 */
function denseRanks(keys: Map<number, RankKey>): Map<number, number> {
  const sorted = [...keys.entries()].sort((a, b) => compareKeys(a[1], b[1]));
  const ranks = new Map<number, number>();
  let rank = -1;
  let previous: RankKey | null = null;

  for (const [id, key] of sorted) {
    if (previous === null || compareKeys(previous, key) !== 0) {
      rank++;
    }
    ranks.set(id, rank);
    previous = key;
  }
  return ranks;
}

function classCount(ranks: Map<number, number>): number {
  return new Set(ranks.values()).size;
}

/**
 * Computes a rank per unit that depends only on unit types and material
 * stream topology, never on insertion order or unit indices.
 *
 * Units start from `(-outDegree, inDegree, type)`; every round then extends
 * the key by the sorted ranks of out-neighbours and in-neighbours. The
 * previous rank leads each key, so a class can only split. Refinement stops
 * once the number of classes no longer grows.
 *
 * @returns unit id to rank; a lower rank is visited first
 */
export function computeRanks(graph: FlowsheetGraph): Map<number, number> {
  const units = graph.getUnits();
  const initial = new Map<number, RankKey>();

  for (const unit of units) {
    const outDegree = graph.getOutStreams(unit.id, 'material').length;
    const inDegree = graph.getInStreams(unit.id, 'material').length;
    initial.set(unit.id, [[-outDegree, inDegree], unit.type]);
  }

  return refine(graph, denseRanks(initial), (unitId, ranks) => [materialKey(graph, unitId, ranks), '']);
}

/**
 * Splits the classes of material ranks further by what the topology alone
 * cannot see: the tags on every stream and the signal streams. Each round
 * adds the rank and masked tag text of every neighbour to the key, so a
 * graph with neither keeps its material ranks.
 */
export function refineRanks(
  graph: FlowsheetGraph,
  ranks: Map<number, number>
): Map<number, number> {
  return refine(graph, ranks, (unitId, current) => {
    const entries: string[] = [];
    for (const stream of graph.getOutStreams(unitId)) {
      entries.push(`${stream.kind}>${current.get(stream.dst) ?? 0}${maskedTags(stream)}`);
    }
    for (const stream of graph.getInStreams(unitId)) {
      entries.push(`${stream.kind}<${current.get(stream.src) ?? 0}${maskedTags(stream)}`);
    }
    return [materialKey(graph, unitId, current), entries.sort().join(',')];
  });
}

function materialKey(graph: FlowsheetGraph, unitId: number, ranks: Map<number, number>): number[] {
  const rank = ranks.get(unitId) ?? 0;
  const outRanks = graph.getOutStreams(unitId, 'material')
    .map(stream => ranks.get(stream.dst) ?? 0)
    .sort((a, b) => a - b);
  const inRanks = graph.getInStreams(unitId, 'material')
    .map(stream => ranks.get(stream.src) ?? 0)
    .sort((a, b) => a - b);
  // -1 separates the two neighbour lists so their lengths stay part of the key
  return [rank, ...outRanks, -1, ...inRanks];
}

// empty for an untagged stream, so that it sorts before any tagged one
function maskedTags(stream: Stream): string {
  return hasTags(stream.tags) ? tagBlockToString(tagsToEntries(stream.tags, () => null)) : '';
}

function refine(
  graph: FlowsheetGraph,
  initial: Map<number, number>,
  key: (unitId: number, ranks: Map<number, number>) => RankKey
): Map<number, number> {
  const units = graph.getUnits();
  let ranks = initial;

  for (let round = 0; round < units.length; round++) {
    const refined = new Map<number, RankKey>();
    for (const unit of units) {
      refined.set(unit.id, key(unit.id, ranks));
    }

    const next = denseRanks(refined);
    if (classCount(next) <= classCount(ranks)) {
      break;
    }
    ranks = next;
  }

  return ranks;
}
