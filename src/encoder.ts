/**
 * Flowsheet graph to canonical SFILES encoder
 */

import { UnencodableGraphError } from './exceptions.js';
import type { FlowsheetGraph, Stream, UnitOperation } from './flowsheet-graph.js';
import { normalizeHeatIntegration } from './heat-integration.js';
import { computeRanks, refineRanks } from './invariant-ranker.js';
import { hasTags, tagBlockToString, tagCount, tagsToEntries } from './tag-rules.js';
import { tokensToString } from './tokenizer.js';
import {
  clusterSizes,
  compareNumberArrays,
  compareStrings,
  compareUnits,
  duplicateStreamPairs,
  exchangerClusters,
  weaklyConnectedComponents
} from './utils/graph-utils.js';
import type {
  EncodeOptions,
  MarkerTokenKind,
  ResolvedEncodeOptions,
  StreamKind,
  Token
} from './types.js';

export const DEFAULT_ENCODE_OPTIONS: Readonly<ResolvedEncodeOptions> = Object.freeze({
  version: 'v2',
  canonical: true,
  removeNumbering: false
});

// Highest cycle or signal number the notation can express (%99)
const MAX_MARKER_NUMBER = 99;

interface Link {
  kind: StreamKind;
  stream: Stream;
}

interface MarkerRef {
  link: Link;
  end: 'source' | 'destination';
}

interface SourceEntry {
  unit: UnitOperation;
  // generalized string of the traversal the source opens
  shape: string;
  // units that traversal reaches
  reach: number[];
}

interface IncomingBranch {
  segment: UnitItem[];
  join: Stream;
}

// One unit as it appears in the string, with everything rendered around it
interface UnitItem {
  unitId: number;
  // tree stream entering the unit; its tags follow the unit token
  inbound: Stream | null;
  incoming: IncomingBranch[];
  markers: MarkerRef[];
  branches: UnitItem[][];
}

/**
 * Translates a flowsheet graph into its SFILES string.
 *
 * The graph is not modified: heat-integration normalization runs on a copy
 * (merge for v2, split for v1).
 *
 * @throws UnencodableGraphError when two streams of one kind join the same
 *   ordered pair of units, when a unit cannot be reached from any source, or
 *   when more than 99 cycle or signal numbers are needed
 * @throws AmbiguousHeatIntegrationError when heat integration cannot be normalized
 *
 * @example
 * ```typescript
 * const graph = parse("(raw)[(r)](hex)(sep)(prod)");
 * encode(graph); // '(raw-1)[(r-1)](hex-1)(sep-1)(prod-1)'
 * encode(graph, { removeNumbering: true }); // '(raw)[(r)](hex)(sep)(prod)'
 * ```
 */
export function encode(graph: FlowsheetGraph, options?: EncodeOptions): string {
  return tokensToString(encodeTokens(graph, options));
}

/**
 * Same as {@link encode}, returning the rendered tokens with their offsets
 * in the output string.
 */
export function encodeTokens(graph: FlowsheetGraph, options?: EncodeOptions): Token[] {
  const resolved: ResolvedEncodeOptions = { ...DEFAULT_ENCODE_OPTIONS, ...options };
  const working = normalizeHeatIntegration(graph, resolved.version === 'v2' ? 'merge' : 'split');

  const duplicates = duplicateStreamPairs(working);
  if (duplicates.length > 0) {
    const [src, dst] = duplicates[0];
    throw new UnencodableGraphError(
      `More than one stream of the same kind from ${working.getUnit(src).name} ` +
      `to ${working.getUnit(dst).name}`
    );
  }

  const ranks = resolved.canonical
    ? refineRanks(working, computeRanks(working))
    : insertionRanks(working);
  const traversal = new CanonicalTraversal(working, ranks, resolved.canonical);
  const segments = traverseComponents(working, traversal, ranks, resolved.canonical);

  const unvisited = working.getUnits().filter(unit => !traversal.visited.has(unit.id));
  if (unvisited.length > 0) {
    throw new UnencodableGraphError(
      `No source unit reaches ${unvisited.map(unit => unit.name).join(', ')}`
    );
  }

  traversal.linkSignals();

  const context = new RenderContext(working, resolved, false);
  context.renderSegments(segments);
  return context.tokens;
}

function insertionRanks(graph: FlowsheetGraph): Map<number, number> {
  return new Map(graph.getUnits().map((unit, position) => [unit.id, position]));
}

/**
 * Runs the traversal from every source, component by component.
 *
 * The first source of a component opens its segment. A later source joins
 * as an incoming branch in front of a unit rendered before it when its main
 * line ends in a stream to that unit; otherwise it becomes a segment of its own.
 */
function traverseComponents(
  graph: FlowsheetGraph,
  traversal: CanonicalTraversal,
  ranks: Map<number, number>,
  canonical: boolean
): UnitItem[][] {
  const pending = orderSources(graph, ranks, canonical);
  const componentOf = new Map<number, number>();
  weaklyConnectedComponents(graph).forEach((members, label) => {
    for (const unitId of members) componentOf.set(unitId, label);
  });

  const segments: UnitItem[][] = [];

  while (pending.length > 0) {
    const first = takeSource(pending, pending, traversal, ranks);
    const component = componentOf.get(first.unit.id);
    segments.push(traversal.traverse(first.unit.id));

    while (true) {
      const candidates = pending.filter(entry => componentOf.get(entry.unit.id) === component);
      if (candidates.length === 0) break;

      const later = takeSource(pending, candidates, traversal, ranks);
      const before = new Set(traversal.visited);
      const segment = traversal.traverse(later.unit.id);
      if (!traversal.joinAsIncoming(segment, before)) {
        segments.push(segment);
      }
    }
  }

  return segments;
}

/**
 * Sources ordered by rank, then by the shape of the traversal each opens,
 * then by unit order. Without canonical ordering they keep insertion order.
 */
function orderSources(
  graph: FlowsheetGraph,
  ranks: Map<number, number>,
  canonical: boolean
): SourceEntry[] {
  const sources = graph.getUnits().filter(unit => graph.getInStreams(unit.id, 'material').length === 0);
  if (!canonical) {
    return sources.map(unit => ({ unit, shape: '', reach: [] }));
  }

  const entries = sources.map(unit => {
    const preview = new CanonicalTraversal(graph, ranks, false);
    const shape = renderGeneralized(graph, preview.traverse(unit.id));
    return { unit, shape, reach: preview.order };
  });

  return entries.sort((a, b) =>
    (ranks.get(a.unit.id) ?? 0) - (ranks.get(b.unit.id) ?? 0) ||
    compareStrings(a.shape, b.shape) ||
    compareUnits(a.unit, b.unit)
  );
}

/**
 * Removes and returns the next source among the candidates. Candidates tied
 * with the first on rank and shape are told apart by where their signal
 * partners already sit in the traversal.
 */
function takeSource(
  pending: SourceEntry[],
  candidates: SourceEntry[],
  traversal: CanonicalTraversal,
  ranks: Map<number, number>
): SourceEntry {
  const [head] = candidates;
  let best = head;
  let bestContacts = traversal.signalContacts(head.reach);

  for (const entry of candidates.slice(1)) {
    if (ranks.get(entry.unit.id) !== ranks.get(head.unit.id) || entry.shape !== head.shape) break;
    const contacts = traversal.signalContacts(entry.reach);
    if (compareNumberArrays(contacts, bestContacts) < 0) {
      best = entry;
      bestContacts = contacts;
    }
  }

  pending.splice(pending.indexOf(best), 1);
  return best;
}

function renderGeneralized(graph: FlowsheetGraph, segment: UnitItem[]): string {
  const context = new RenderContext(graph, { ...DEFAULT_ENCODE_OPTIONS, removeNumbering: true }, true);
  context.renderSegments([segment]);
  return tokensToString(context.tokens);
}

function maskedTagText(stream: Stream): string {
  return tagBlockToString(tagsToEntries(stream.tags, () => null));
}

/**
 * Depth-first traversal that turns the material streams of a graph into
 * segments of unit items. Streams into visited units become cycle links.
 */
class CanonicalTraversal {
  readonly visited: Set<number>;
  // units in the order they were reached
  readonly order: number[] = [];
  private readonly position = new Map<number, number>();
  private readonly items = new Map<number, UnitItem>();

  constructor(
    private readonly graph: FlowsheetGraph,
    private readonly ranks: Map<number, number>,
    private readonly lookahead: boolean,
    visited: Set<number> = new Set()
  ) {
    this.visited = visited;
  }

  traverse(start: number, inbound: Stream | null = null): UnitItem[] {
    const segment: UnitItem[] = [];
    let unitId = start;
    let stream = inbound;

    while (true) {
      const item = this.enter(unitId, stream);
      segment.push(item);

      const children: Stream[] = [];
      for (const out of this.graph.getOutStreams(unitId, 'material')) {
        if (this.visited.has(out.dst)) this.link(out);
        else children.push(out);
      }
      if (children.length === 0) break;

      const [main, ...branches] = this.orderChildren(children);
      for (const branch of branches) {
        if (this.visited.has(branch.dst)) this.link(branch);
        else item.branches.push(this.traverse(branch.dst, branch));
      }

      if (this.visited.has(main.dst)) {
        // A branch already reached the main-line unit; the last branch takes its place.
        this.link(main);
        const last = item.branches.pop();
        if (last) segment.push(...last);
        break;
      }
      unitId = main.dst;
      stream = main;
    }

    return segment;
  }

  /**
   * Re-hangs a segment as an incoming branch of a unit reached before it was
   * traversed, using a cycle link from the segment's last unit.
   */
  joinAsIncoming(segment: UnitItem[], before: Set<number>): boolean {
    const last = segment[segment.length - 1];
    const marker = last.markers.find(m =>
      m.end === 'source' && m.link.kind === 'material' && before.has(m.link.stream.dst)
    );
    if (!marker) {
      return false;
    }

    const target = this.item(marker.link.stream.dst);
    last.markers.splice(last.markers.indexOf(marker), 1);
    target.markers = target.markers.filter(m => m.link !== marker.link);
    target.incoming.push({ segment, join: marker.link.stream });
    return true;
  }

  /**
   * Attaches every signal stream as a marker pair, ordered by when its source
   * and then its destination were reached.
   */
  linkSignals(): void {
    const position = new Map(this.order.map((unitId, i) => [unitId, i]));
    const signals = this.graph.getStreams('signal').sort((a, b) =>
      (position.get(a.src) ?? 0) - (position.get(b.src) ?? 0) ||
      (position.get(a.dst) ?? 0) - (position.get(b.dst) ?? 0) ||
      a.id - b.id
    );
    for (const stream of signals) {
      this.link(stream);
    }
  }

  /**
   * Positions in this traversal of the signal partners of the given units:
   * destinations, then sources, each sorted. Partners not reached yet are
   * left out.
   */
  signalContacts(units: number[]): number[] {
    const out: number[] = [];
    const inn: number[] = [];
    for (const unitId of units) {
      for (const stream of this.graph.getOutStreams(unitId, 'signal')) {
        const position = this.position.get(stream.dst);
        if (position !== undefined) out.push(position);
      }
      for (const stream of this.graph.getInStreams(unitId, 'signal')) {
        const position = this.position.get(stream.src);
        if (position !== undefined) inn.push(position);
      }
    }
    return [...out.sort((a, b) => a - b), -1, ...inn.sort((a, b) => a - b)];
  }

  private enter(unitId: number, inbound: Stream | null): UnitItem {
    const item: UnitItem = { unitId, inbound, incoming: [], markers: [], branches: [] };
    this.visited.add(unitId);
    this.position.set(unitId, this.order.length);
    this.order.push(unitId);
    this.items.set(unitId, item);
    return item;
  }

  private item(unitId: number): UnitItem {
    const item = this.items.get(unitId);
    if (!item) {
      throw new Error(`Unit ${unitId} has not been traversed`);
    }
    return item;
  }

  private link(stream: Stream): void {
    const link: Link = { kind: stream.kind, stream };
    this.item(stream.src).markers.push({ link, end: 'source' });
    // A lookahead traversal does not own units reached before it started.
    this.items.get(stream.dst)?.markers.push({ link, end: 'destination' });
  }

  /**
   * Orders the streams to unvisited units: rank, then the shape of the
   * sub-traversal each one leads to, then fewer tag entries, then tag text,
   * then the positions of signal partners already reached, then unit order.
   */
  private orderChildren(children: Stream[]): Stream[] {
    if (children.length < 2) {
      return children;
    }

    const shapes = new Map<number, string>();
    const contacts = new Map<number, number[]>();
    if (this.lookahead) {
      for (const child of children) {
        const preview = new CanonicalTraversal(this.graph, this.ranks, false, new Set(this.visited));
        shapes.set(child.id, renderGeneralized(this.graph, preview.traverse(child.dst, child)));
        contacts.set(child.id, this.signalContacts(preview.order));
      }
    }

    return [...children].sort((a, b) =>
      (this.ranks.get(a.dst) ?? 0) - (this.ranks.get(b.dst) ?? 0) ||
      compareStrings(shapes.get(a.id) ?? '', shapes.get(b.id) ?? '') ||
      tagCount(a.tags) - tagCount(b.tags) ||
      compareStrings(maskedTagText(a), maskedTagText(b)) ||
      compareNumberArrays(contacts.get(a.id) ?? [], contacts.get(b.id) ?? []) ||
      compareUnits(this.graph.getUnit(a.dst), this.graph.getUnit(b.dst)) ||
      a.id - b.id
    );
  }
}

/**
 * Emits tokens in string order and numbers everything as it first appears:
 * unit indices per type, cycle and signal numbers, heat-integration groups.
 */
class RenderContext {
  readonly tokens: Token[] = [];
  private offset = 0;
  private readonly clusters: Map<number, number>;
  private readonly sizes: Map<number, number>;
  private readonly typeIndices = new Map<string, number>();
  private readonly clusterIndices = new Map<number, number>();
  private readonly clusterSubs = new Map<number, number>();
  private readonly linkNumbers = new Map<Link, number>();
  // numbers whose pair has one end rendered and the other still to come
  private readonly open: Record<StreamKind, Set<number>> = { material: new Set(), signal: new Set() };
  private readonly groupNumbers = new Map<number, number>();

  constructor(
    private readonly graph: FlowsheetGraph,
    private readonly options: ResolvedEncodeOptions,
    // placeholder markers and no numbering, for comparing traversal shapes
    private readonly generalized: boolean
  ) {
    this.clusters = exchangerClusters(graph, unit =>
      unit.subIndex === null ? null : `${unit.type}-${unit.index}`
    );
    this.sizes = clusterSizes(this.clusters);
  }

  renderSegments(segments: UnitItem[][]): void {
    segments.forEach((segment, i) => {
      if (i > 0) this.push({ kind: 'COMPONENT_SEPARATOR', text: 'n|', offset: this.offset });
      this.renderSegment(segment);
    });
  }

  private renderSegment(segment: UnitItem[]): void {
    for (const item of segment) {
      for (const incoming of item.incoming) {
        this.push({ kind: 'INCOMING_BRANCH_OPEN', text: '<&|', offset: this.offset });
        this.renderSegment(incoming.segment);
        this.push({ kind: 'INCOMING_BRANCH_CLOSE', text: '&|', offset: this.offset });
        this.renderTags(incoming.join);
      }

      this.renderUnit(this.graph.getUnit(item.unitId));
      if (item.inbound) {
        this.renderTags(item.inbound);
      }
      this.renderMarkers(item.markers);

      for (const branch of item.branches) {
        this.push({ kind: 'BRANCH_OPEN', text: '[', offset: this.offset });
        this.renderSegment(branch);
        this.push({ kind: 'BRANCH_CLOSE', text: ']', offset: this.offset });
      }
    }
  }

  private renderUnit(unit: UnitOperation): void {
    if (this.options.removeNumbering || this.generalized) {
      this.push({
        kind: 'NODE',
        text: `(${unit.type})`,
        offset: this.offset,
        unit: { type: unit.type, index: null, subIndex: null }
      });
      return;
    }

    const root = this.clusters.get(unit.id) ?? unit.id;
    let index = this.clusterIndices.get(root);
    if (index === undefined) {
      index = (this.typeIndices.get(unit.type) ?? 0) + 1;
      this.typeIndices.set(unit.type, index);
      this.clusterIndices.set(root, index);
    }

    let subIndex: number | null = null;
    if ((this.sizes.get(root) ?? 1) > 1) {
      subIndex = (this.clusterSubs.get(root) ?? 0) + 1;
      this.clusterSubs.set(root, subIndex);
    }

    const label = subIndex === null ? `${unit.type}-${index}` : `${unit.type}-${index}/${subIndex}`;
    this.push({
      kind: 'NODE',
      text: `(${label})`,
      offset: this.offset,
      unit: { type: unit.type, index, subIndex }
    });
  }

  /**
   * Markers closing a pair come first, lowest number first; markers opening
   * a pair follow in the order their links were made.
   */
  private renderMarkers(markers: MarkerRef[]): void {
    const closing = markers
      .filter(m => this.linkNumbers.has(m.link))
      .sort((a, b) =>
        (a.link.kind === b.link.kind ? 0 : a.link.kind === 'material' ? -1 : 1) ||
        (this.linkNumbers.get(a.link) ?? 0) - (this.linkNumbers.get(b.link) ?? 0)
      );
    const opening = markers.filter(m => !this.linkNumbers.has(m.link));

    for (const marker of [...closing, ...opening]) {
      const number = this.markerNumber(marker.link);
      const signal = marker.link.kind === 'signal';
      const destination = marker.end === 'destination';
      const kind: MarkerTokenKind = signal
        ? (destination ? 'SIGNAL_OPEN' : 'SIGNAL_CLOSE')
        : (destination ? 'CYCLE_OPEN' : 'CYCLE_CLOSE');

      const digits = this.generalized ? '#' : number < 10 ? `${number}` : `%${number}`;
      const text = `${destination ? '<' : ''}${signal ? '_' : ''}${digits}`;
      this.push({ kind, text, offset: this.offset, index: number });

      if (!destination) {
        this.renderTags(marker.link.stream);
      }
    }
  }

  /**
   * The first end of a pair takes the lowest number not held by an open
   * pair; the second end gives it back.
   */
  private markerNumber(link: Link): number {
    const open = this.open[link.kind];
    const existing = this.linkNumbers.get(link);
    if (existing !== undefined) {
      open.delete(existing);
      return existing;
    }
    let number = 1;
    while (open.has(number)) number++;
    if (number > MAX_MARKER_NUMBER && !this.generalized) {
      throw new UnencodableGraphError(
        `More than ${MAX_MARKER_NUMBER} ${link.kind === 'material' ? 'cycle' : 'signal'} numbers are needed`
      );
    }
    open.add(number);
    this.linkNumbers.set(link, number);
    return number;
  }

  private renderTags(stream: Stream): void {
    if (this.options.version === 'v1' || !hasTags(stream.tags)) {
      return;
    }
    const dropGroups = this.options.removeNumbering || this.generalized;
    const entries = tagsToEntries(stream.tags, group => (dropGroups ? null : this.groupNumber(group)));
    this.push({ kind: 'TAG_BLOCK', text: tagBlockToString(entries), offset: this.offset, entries });
  }

  private groupNumber(group: number): number {
    let number = this.groupNumbers.get(group);
    if (number === undefined) {
      number = this.groupNumbers.size + 1;
      this.groupNumbers.set(group, number);
    }
    return number;
  }

  private push(token: Token): void {
    this.tokens.push(token);
    this.offset += token.text.length;
  }
}
