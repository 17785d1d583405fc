/**
 * Heat-integration analysis and normalization
 *
 * A heat-integration group is the set of tag entries sharing one explicit
 * group id. Each entry names an exchanger unit: the destination of the tagged
 * stream for an inlet, its source for an outlet. A group may live on a single
 * merged exchanger unit or be spread over sub-nodes, one per stream.
 */

import { AmbiguousHeatIntegrationError } from './exceptions.js';
import type { FlowsheetGraph, Stream, UnitNumbering } from './flowsheet-graph.js';
import { exchangerEnd } from './tag-rules.js';
import { compareUnits } from './utils/graph-utils.js';
import { warnUnmergedHeatIntegration } from './utils/warnings.js';
import type { HeatIntegrationMode, HeatIntegrationTag, HeatSide } from './types.js';

export interface HeatIntegrationParticipation {
  stream: Stream;
  tag: HeatIntegrationTag;
  exchanger: number;
}

export interface HeatIntegrationGroup {
  group: number;
  participations: HeatIntegrationParticipation[];
  // exchanger unit ids in order of first participation
  exchangers: number[];
}

const SIDES: readonly HeatSide[] = ['hot', 'cold'];

interface SideStreams {
  inlets: Stream[];
  outlets: Stream[];
}

/**
 * Collects every explicit heat-integration group, ordered by group id.
 */
export function collectHeatIntegrationGroups(graph: FlowsheetGraph): HeatIntegrationGroup[] {
  const groups = new Map<number, HeatIntegrationGroup>();

  for (const stream of graph.getStreams('material')) {
    for (const tag of stream.tags.heatIntegration) {
      if (tag.group === null) continue;

      let entry = groups.get(tag.group);
      if (!entry) {
        entry = { group: tag.group, participations: [], exchangers: [] };
        groups.set(tag.group, entry);
      }
      const exchanger = exchangerEnd(tag, stream);
      entry.participations.push({ stream, tag, exchanger });
      if (!entry.exchangers.includes(exchanger)) {
        entry.exchangers.push(exchanger);
      }
    }
  }

  return [...groups.values()].sort((a, b) => a.group - b.group);
}

/**
 * Checks that every explicit group can be resolved into inlet/outlet pairs.
 *
 * @throws AmbiguousHeatIntegrationError for an odd number of participating
 *   entries, or an exchanger side whose inlets and outlets do not balance
 */
export function validateHeatIntegration(graph: FlowsheetGraph): void {
  for (const group of collectHeatIntegrationGroups(graph)) {
    const count = group.participations.length;
    if (count % 2 !== 0) {
      throw new AmbiguousHeatIntegrationError(
        `Heat-integration group ${group.group} has ${count} participating streams; ` +
        `streams must pair into inlets and outlets`,
        group.group
      );
    }

    for (const exchanger of group.exchangers) {
      const sides = sideStreams(group, exchanger);
      for (const side of SIDES) {
        const { inlets, outlets } = sides[side];
        if (inlets.length !== outlets.length) {
          throw new AmbiguousHeatIntegrationError(
            `Heat-integration group ${group.group} has ${inlets.length} ${side} inlet(s) but ` +
            `${outlets.length} ${side} outlet(s) at ${graph.getUnit(exchanger).name}`,
            group.group
          );
        }
      }
    }
  }
}

/**
 * Returns a normalized copy of the graph; the input is left untouched.
 *
 * - `merge`: collapses a group spread over several exchanger units into one
 *   unit where that keeps the graph unambiguous, then splits any exchanger
 *   that still carries two streams between the same ordered pair of units.
 * - `split`: decomposes every exchanger serving more than one stream of a
 *   group into sub-nodes, one per stream.
 */
export function normalizeHeatIntegration(
  graph: FlowsheetGraph,
  mode: HeatIntegrationMode
): FlowsheetGraph {
  const result = graph.clone();
  validateHeatIntegration(result);

  if (mode === 'merge') {
    for (const group of collectHeatIntegrationGroups(result)) {
      mergeGroup(result, group);
    }
    for (const group of collectHeatIntegrationGroups(result)) {
      if (group.exchangers.some(unitId => hasDuplicateStreams(result, unitId))) {
        splitGroup(result, group);
      }
    }
  } else {
    for (const group of collectHeatIntegrationGroups(result)) {
      splitGroup(result, group);
    }
  }

  return result;
}

function sideStreams(group: HeatIntegrationGroup, exchanger: number): Record<HeatSide, SideStreams> {
  const sides: Record<HeatSide, SideStreams> = {
    hot: { inlets: [], outlets: [] },
    cold: { inlets: [], outlets: [] }
  };
  for (const { stream, tag, exchanger: unitId } of group.participations) {
    if (unitId !== exchanger) continue;
    const side = sides[tag.side];
    (tag.port === 'in' ? side.inlets : side.outlets).push(stream);
  }
  return sides;
}

function groupsServedBy(graph: FlowsheetGraph, unitId: number): Set<number> {
  const groups = new Set<number>();
  for (const stream of [...graph.getInStreams(unitId, 'material'), ...graph.getOutStreams(unitId, 'material')]) {
    for (const tag of stream.tags.heatIntegration) {
      if (tag.group !== null && exchangerEnd(tag, stream) === unitId) {
        groups.add(tag.group);
      }
    }
  }
  return groups;
}

function hasDuplicateStreams(graph: FlowsheetGraph, unitId: number): boolean {
  const seen = new Set<string>();
  for (const stream of [...graph.getInStreams(unitId), ...graph.getOutStreams(unitId)]) {
    const key = `${stream.kind}:${stream.src}->${stream.dst}`;
    if (seen.has(key) && stream.src !== stream.dst) {
      return true;
    }
    seen.add(key);
  }
  return false;
}

function mergeGroup(graph: FlowsheetGraph, group: HeatIntegrationGroup): void {
  if (group.exchangers.length < 2) {
    return;
  }

  const reason = mergeObstacle(graph, group);
  if (reason !== null) {
    warnUnmergedHeatIntegration(group.group, reason);
    return;
  }

  const units = group.exchangers.map(id => graph.getUnit(id)).sort(compareUnits);
  const [target, ...others] = units;

  for (const other of others) {
    for (const stream of graph.getInStreams(other.id)) {
      graph.redirectStream(stream.id, { dst: target.id });
    }
    for (const stream of graph.getOutStreams(other.id)) {
      graph.redirectStream(stream.id, { src: target.id });
    }
    graph.removeUnit(other.id);
  }

  if (target.subIndex !== null) {
    graph.relabel(new Map([[target.id, { index: target.index, subIndex: null }]]));
  }
}

/**
 * Explains why a group cannot be merged into one unit, or returns null.
 */
function mergeObstacle(graph: FlowsheetGraph, group: HeatIntegrationGroup): string | null {
  const members = new Set(group.exchangers);
  const types = new Set(group.exchangers.map(id => graph.getUnit(id).type));
  if (types.size > 1) {
    return `exchanger units have different types (${[...types].sort().join(', ')})`;
  }

  for (const unitId of group.exchangers) {
    if (groupsServedBy(graph, unitId).size > 1) {
      return `${graph.getUnit(unitId).name} serves more than one group`;
    }
  }

  let hot = 0;
  let cold = 0;
  for (const { tag } of group.participations) {
    if (tag.port !== 'in') continue;
    if (tag.side === 'hot') hot++;
    else cold++;
  }
  if (hot > 1 || cold > 1) {
    return `a merged exchanger would carry ${hot} hot and ${cold} cold streams`;
  }

  const merged = (unitId: number): number => (members.has(unitId) ? -1 : unitId);
  const pairs = new Set<string>();
  for (const unitId of group.exchangers) {
    for (const stream of [...graph.getInStreams(unitId), ...graph.getOutStreams(unitId)]) {
      const src = merged(stream.src);
      const dst = merged(stream.dst);
      if (src === -1 && dst === -1) {
        return `stream ${graph.getUnit(stream.src).name} -> ${graph.getUnit(stream.dst).name} would become a self-loop`;
      }
      const pair = `${stream.kind}:${src}->${dst}`;
      if (pairs.has(pair)) {
        return `merging would duplicate the stream ${graph.getUnit(stream.src).name} -> ${graph.getUnit(stream.dst).name}`;
      }
      pairs.add(pair);
    }
  }

  return null;
}

function splitGroup(graph: FlowsheetGraph, group: HeatIntegrationGroup): void {
  const numbering = new Map<number, UnitNumbering>();
  const units = group.exchangers.map(id => graph.getUnit(id)).sort(compareUnits);
  const index = units[0].index;
  let subIndex = 0;

  for (const unit of units) {
    const sides = sideStreams(group, unit.id);
    const streams = SIDES.filter(side => sides[side].inlets.length > 0);

    if (groupsServedBy(graph, unit.id).size > 1) {
      throw new AmbiguousHeatIntegrationError(
        `${unit.name} serves more than one heat-integration group and cannot be split`,
        group.group
      );
    }
    for (const side of streams) {
      if (sides[side].inlets.length > 1) {
        throw new AmbiguousHeatIntegrationError(
          `${unit.name} carries ${sides[side].inlets.length} ${side} streams of group ` +
          `${group.group}; inlets and outlets cannot be paired`,
          group.group
        );
      }
    }

    if (streams.length < 2) {
      numbering.set(unit.id, { index, subIndex: ++subIndex });
      continue;
    }

    const tagged = new Set<number>();
    for (const side of streams) {
      tagged.add(sides[side].inlets[0].id);
      tagged.add(sides[side].outlets[0].id);
    }
    for (const stream of [...graph.getInStreams(unit.id, 'material'), ...graph.getOutStreams(unit.id, 'material')]) {
      if (!tagged.has(stream.id)) {
        throw new AmbiguousHeatIntegrationError(
          `${unit.name} has an untagged stream that cannot be assigned to a sub-node`,
          group.group
        );
      }
    }

    // The first side keeps the unit (and its signal streams); each further
    // side moves to a fresh sub-node.
    numbering.set(unit.id, { index, subIndex: ++subIndex });
    for (const side of streams.slice(1)) {
      const sub = graph.addUnit(unit.type);
      graph.redirectStream(sides[side].inlets[0].id, { dst: sub.id });
      graph.redirectStream(sides[side].outlets[0].id, { src: sub.id });
      numbering.set(sub.id, { index, subIndex: ++subIndex });
    }
  }

  if (subIndex < 2) {
    // A single exchanger unit needs no sub-index.
    numbering.set(units[0].id, { index, subIndex: null });
  }

  try {
    graph.relabel(numbering);
  } catch (error) {
    throw new AmbiguousHeatIntegrationError(
      `Heat-integration group ${group.group} cannot be numbered: ` +
      `${error instanceof Error ? error.message : String(error)}`,
      group.group
    );
  }
}
