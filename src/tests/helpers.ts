import { FlowsheetGraph } from '../index.js';
import type { StreamKind } from '../index.js';
import { parseTagBlock, parseUnitLabel, tagEntryToString, tagsFromEntries, tagsToEntries } from '../tag-rules.js';

// [source name, destination name, tag block content, kind]
export type StreamSpec = [string, string, string?, StreamKind?];

/**
 * Builds a graph from unit names and streams between them, in the order given.
 */
export function flowsheet(units: string[], streams: StreamSpec[]): FlowsheetGraph {
  const graph = new FlowsheetGraph();
  for (const name of units) {
    const label = parseUnitLabel(name);
    if (label === null) {
      throw new Error(`bad unit name in test: ${name}`);
    }
    graph.addUnit(label.type, label.index ?? undefined, label.subIndex);
  }
  for (const [src, dst, tags = '', kind = 'material'] of streams) {
    const entries = parseTagBlock(tags);
    if (!Array.isArray(entries)) {
      throw new Error(`bad tag block in test: ${tags}`);
    }
    graph.addStream(unitId(graph, src), unitId(graph, dst), kind, tagsFromEntries(entries));
  }
  return graph;
}

export function unitId(graph: FlowsheetGraph, name: string): number {
  const unit = graph.findUnit(name);
  if (unit === null) {
    throw new Error(`no unit named ${name}`);
  }
  return unit.id;
}

export function tagText(graph: FlowsheetGraph, src: string, dst: string): string {
  const stream = graph.getOutStreams(unitId(graph, src)).find(s => s.dst === unitId(graph, dst));
  if (!stream) {
    throw new Error(`no stream ${src} -> ${dst}`);
  }
  return tagsToEntries(stream.tags).map(tagEntryToString).join(';');
}

/**
 * Lists every stream as `srcType->dstType:kind:tags`, sorted, so graphs can
 * be compared without relying on unit numbering.
 */
export function streamSummary(graph: FlowsheetGraph, withTags: boolean = true): string[] {
  return graph.getStreams().map(stream => {
    const tags = withTags ? tagsToEntries(stream.tags, () => null).map(tagEntryToString).join(';') : '';
    return `${graph.getUnit(stream.src).type}->${graph.getUnit(stream.dst).type}:${stream.kind}:${tags}`;
  }).sort();
}

export function unitNames(graph: FlowsheetGraph): string[] {
  return graph.getUnits().map(unit => unit.name);
}

/**
 * Deterministic generator of numbers in [0, 1) (mulberry32).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function shuffle<T>(random: () => number, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

const RANDOM_TYPES = ['raw', 'u', 'v'];
const MATERIAL_TAGS = ['', '', 'hot_in', 'col_tout'];
const SIGNAL_TAGS = ['', 'sig_tc'];

/**
 * A small encodable flowsheet: every unit is reached from a source, no
 * ordered pair carries two streams of one kind, and some units exchange
 * signals.
 */
export function randomFlowsheet(random: () => number): { units: string[]; streams: StreamSpec[] } {
  const count = 3 + Math.floor(random() * 5);
  const counters = new Map<string, number>();
  const units = Array.from({ length: count }, () => {
    const type = pick(random, RANDOM_TYPES);
    const index = (counters.get(type) ?? 0) + 1;
    counters.set(type, index);
    return `${type}-${index}`;
  });

  const streams: StreamSpec[] = [];
  const pairs = new Set<string>();
  const entered = new Set<string>();
  const add = (src: string, dst: string, kind: StreamKind, tags: string): void => {
    const key = `${kind}:${src}->${dst}`;
    if (src === dst || pairs.has(key)) return;
    pairs.add(key);
    streams.push([src, dst, tags, kind]);
  };

  for (let i = 1; i < count; i++) {
    if (random() < 0.25) continue;
    add(units[Math.floor(random() * i)], units[i], 'material', pick(random, MATERIAL_TAGS));
    entered.add(units[i]);
  }
  for (let extra = Math.floor(random() * 3); extra > 0; extra--) {
    const dst = pick(random, units);
    // streams only enter units that already have one, so every source stays a source
    if (entered.has(dst)) {
      add(pick(random, units), dst, 'material', pick(random, MATERIAL_TAGS));
    }
  }
  for (let signals = Math.floor(random() * 3); signals > 0; signals--) {
    add(pick(random, units), pick(random, units), 'signal', pick(random, SIGNAL_TAGS));
  }

  return { units, streams };
}

/**
 * The same flowsheet with units and streams in a shuffled order and the
 * indices of each type permuted.
 */
export function relabelled(
  units: string[],
  streams: StreamSpec[],
  random: () => number
): { units: string[]; streams: StreamSpec[] } {
  const byType = new Map<string, string[]>();
  for (const name of units) {
    const type = name.slice(0, name.lastIndexOf('-'));
    byType.set(type, [...(byType.get(type) ?? []), name]);
  }

  const rename = new Map<string, string>();
  for (const [type, names] of byType) {
    const indices = shuffle(random, names.map((_, i) => i + 1));
    names.forEach((name, i) => rename.set(name, `${type}-${indices[i]}`));
  }
  const renamed = (name: string): string => rename.get(name) ?? name;

  return {
    units: shuffle(random, units).map(renamed),
    streams: shuffle(random, streams).map(([src, dst, tags, kind]): StreamSpec => [renamed(src), renamed(dst), tags, kind])
  };
}
