/**
 * SFILES to flowsheet graph parser
 */

import { MalformedSyntaxError, MalformedTopologyError } from './exceptions.js';
import { FlowsheetGraph } from './flowsheet-graph.js';
import type { Stream, UnitNumbering } from './flowsheet-graph.js';
import { validateHeatIntegration } from './heat-integration.js';
import { tagsFromEntries } from './tag-rules.js';
import { tokenize } from './tokenizer.js';
import { clusterSizes, exchangerClusters } from './utils/graph-utils.js';
import type { MarkerToken, ParseOptions, StreamKind, TagEntry, Token, UnitLabel } from './types.js';

/**
 * Translates an SFILES string into a flowsheet graph.
 *
 * The returned graph is frozen; clone it before editing.
 *
 * @throws MalformedSyntaxError for lexical errors, tag blocks under a v1
 *   hint, or unit codes missing from the given vocabulary
 * @throws MalformedTopologyError for unpaired markers or dangling joins
 * @throws AmbiguousHeatIntegrationError for unresolvable heat-integration tags
 *
 * @example
 * ```typescript
 * const graph = parse("(raw)(r)<1(sep)1(prod)");
 * graph.getUnits().map(u => u.name); // ['raw-1', 'r-1', 'sep-1', 'prod-1']
 * ```
 */
export function parse(sfiles: string, options?: ParseOptions): FlowsheetGraph {
  const tokens = tokenize(sfiles);

  for (const token of tokens) {
    if (options?.version === 'v1' && token.kind === 'TAG_BLOCK') {
      throw new MalformedSyntaxError(sfiles, 'tag blocks are not part of SFILES v1', token.offset);
    }
    if (options?.vocabulary && token.kind === 'NODE' && !options.vocabulary.hasCode(token.unit.type)) {
      throw new MalformedSyntaxError(sfiles, `unknown unit code '${token.unit.type}'`, token.offset);
    }
  }

  return buildGraph(tokens).freeze();
}

interface Frame {
  kind: 'branch' | 'incoming';
  cursor: number | null;
  unitsAtOpen: number;
  offset: number;
}

interface PendingJoin {
  src: number;
  tags: TagEntry[];
  offset: number;
}

interface PendingMarker {
  end: 'source' | 'destination';
  unit: number;
  tags: TagEntry[];
  offset: number;
}

type TagTarget =
  | { kind: 'stream'; stream: Stream }
  | { kind: 'join'; join: PendingJoin }
  | { kind: 'marker'; marker: PendingMarker };

/**
 * Materializes a graph from a token sequence and renumbers its units by
 * order of first appearance.
 */
export function buildGraph(tokens: readonly Token[]): FlowsheetGraph {
  const graph = new FlowsheetGraph();
  const literals = new Map<number, UnitLabel>();
  const stack: Frame[] = [];
  const cycles = new Map<number, PendingMarker>();
  const signals = new Map<number, PendingMarker>();
  let pendingJoins: PendingJoin[] = [];
  let cursor: number | null = null;
  let tagTarget: TagTarget | null = null;

  const requireNoPendingJoin = (token: Token): void => {
    if (pendingJoins.length > 0) {
      throw new MalformedTopologyError(
        `incoming branch is not followed by a unit (found '${token.text}')`,
        pendingJoins[0].offset
      );
    }
  };

  const pairMarker = (token: MarkerToken, pending: Map<number, PendingMarker>, kind: StreamKind): void => {
    if (cursor === null) {
      throw new MalformedTopologyError(`marker '${token.text}' has no preceding unit`, token.offset);
    }
    const end = token.kind === 'CYCLE_OPEN' || token.kind === 'SIGNAL_OPEN' ? 'destination' : 'source';
    const open = pending.get(token.index);

    if (!open) {
      const marker: PendingMarker = { end, unit: cursor, tags: [], offset: token.offset };
      pending.set(token.index, marker);
      tagTarget = { kind: 'marker', marker };
      return;
    }
    if (open.end === end) {
      throw new MalformedTopologyError(
        `${kind === 'material' ? 'cycle' : 'signal'} number ${token.index} is already open`,
        token.offset
      );
    }

    pending.delete(token.index);
    const [src, dst] = end === 'source' ? [cursor, open.unit] : [open.unit, cursor];
    const stream = graph.addStream(src, dst, kind, tagsFromEntries(open.tags));
    tagTarget = { kind: 'stream', stream };
  };

  for (const token of tokens) {
    switch (token.kind) {
      case 'NODE': {
        const unit = graph.addUnit(token.unit.type);
        literals.set(unit.id, token.unit);

        for (const join of pendingJoins) {
          graph.addStream(join.src, unit.id, 'material', tagsFromEntries(join.tags));
        }
        pendingJoins = [];

        tagTarget = null;
        if (cursor !== null) {
          tagTarget = { kind: 'stream', stream: graph.addStream(cursor, unit.id) };
        }
        cursor = unit.id;
        break;
      }

      case 'BRANCH_OPEN':
        requireNoPendingJoin(token);
        if (cursor === null) {
          throw new MalformedTopologyError("branch '[' has no preceding unit", token.offset);
        }
        stack.push({ kind: 'branch', cursor, unitsAtOpen: graph.size, offset: token.offset });
        tagTarget = null;
        break;

      case 'INCOMING_BRANCH_OPEN':
        stack.push({ kind: 'incoming', cursor, unitsAtOpen: graph.size, offset: token.offset });
        cursor = null;
        tagTarget = null;
        break;

      case 'BRANCH_CLOSE':
      case 'INCOMING_BRANCH_CLOSE': {
        requireNoPendingJoin(token);
        const frame = stack.pop();
        if (!frame) {
          throw new MalformedTopologyError(`unmatched '${token.text}'`, token.offset);
        }
        if (graph.size === frame.unitsAtOpen || cursor === null) {
          throw new MalformedTopologyError('empty branch', frame.offset);
        }
        tagTarget = null;
        if (frame.kind === 'incoming') {
          const join: PendingJoin = { src: cursor, tags: [], offset: frame.offset };
          pendingJoins.push(join);
          tagTarget = { kind: 'join', join };
        }
        cursor = frame.cursor;
        break;
      }

      case 'CYCLE_OPEN':
      case 'CYCLE_CLOSE':
        requireNoPendingJoin(token);
        pairMarker(token, cycles, 'material');
        break;

      case 'SIGNAL_OPEN':
      case 'SIGNAL_CLOSE':
        requireNoPendingJoin(token);
        pairMarker(token, signals, 'signal');
        break;

      case 'TAG_BLOCK':
        attachTags(tagTarget, token);
        tagTarget = null;
        break;

      case 'COMPONENT_SEPARATOR':
        requireNoPendingJoin(token);
        cursor = null;
        tagTarget = null;
        break;
    }
  }

  if (pendingJoins.length > 0) {
    throw new MalformedTopologyError('incoming branch is not followed by a unit', pendingJoins[0].offset);
  }
  for (const [pending, name] of [[cycles, 'cycle'], [signals, 'signal']] as const) {
    for (const [index, marker] of pending) {
      throw new MalformedTopologyError(`${name} number ${index} is never paired`, marker.offset);
    }
  }

  validateHeatIntegration(graph);
  renumber(graph, literals);
  return graph;
}

function attachTags(target: TagTarget | null, token: Extract<Token, { kind: 'TAG_BLOCK' }>): void {
  if (target === null) {
    throw new MalformedTopologyError(`tag block '${token.text}' does not follow a stream`, token.offset);
  }
  switch (target.kind) {
    case 'stream': {
      const tags = tagsFromEntries(token.entries);
      target.stream.tags.heatIntegration.push(...tags.heatIntegration);
      target.stream.tags.column.push(...tags.column);
      target.stream.tags.signal.push(...tags.signal);
      target.stream.tags.other.push(...tags.other);
      break;
    }
    case 'join':
      target.join.tags.push(...token.entries);
      break;
    case 'marker':
      target.marker.tags.push(...token.entries);
      break;
  }
}

/**
 * Reassigns unit numbers by order of first appearance.
 *
 * Units that form one heat exchanger share an index and are told apart by
 * sub-index: units written with the same literal `type-index/sub` prefix, and
 * units of one type acting as exchanger for the same heat-integration group.
 */
export function renumber(graph: FlowsheetGraph, literals: Map<number, UnitLabel> = new Map()): void {
  const clusters = exchangerClusters(graph, unit => {
    const literal = literals.get(unit.id);
    return literal && literal.index !== null && literal.subIndex !== null
      ? `${literal.type}-${literal.index}`
      : null;
  });
  const sizes = clusterSizes(clusters);

  const lastIndex = new Map<string, number>();
  const clusterIndex = new Map<number, number>();
  const clusterSubs = new Map<number, number>();
  const numbering = new Map<number, UnitNumbering>();

  for (const unit of graph.getUnits()) {
    const root = clusters.get(unit.id) ?? unit.id;
    let index = clusterIndex.get(root);
    if (index === undefined) {
      index = (lastIndex.get(unit.type) ?? 0) + 1;
      lastIndex.set(unit.type, index);
      clusterIndex.set(root, index);
    }

    let subIndex: number | null = null;
    if ((sizes.get(root) ?? 1) > 1) {
      subIndex = (clusterSubs.get(root) ?? 0) + 1;
      clusterSubs.set(root, subIndex);
    }
    numbering.set(unit.id, { index, subIndex });
  }

  graph.relabel(numbering);
}
