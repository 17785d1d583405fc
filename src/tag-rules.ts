/**
 * Grammar rules for tag entries and the per-stream tag record
 */

import type {
  ColumnTag,
  HeatIntegrationTag,
  StreamTags,
  TagEntry,
  UnitLabel
} from './types.js';

const TAG_ENTRY_PATTERN = /^([a-z]+)_([a-z0-9]+)$/;
const HEAT_QUALIFIER_PATTERN = /^(in|out)([1-9]\d*)?$/;
const UNIT_LABEL_PATTERN = /^([A-Za-z][A-Za-z0-9_]*)(?:-([1-9]\d*)(?:\/([1-9]\d*))?)?$/;

export const TAG_SEPARATOR = ';';

const COLUMN_QUALIFIERS: Record<string, ColumnTag> = {
  tin: { section: 'top', port: 'in' },
  tout: { section: 'top', port: 'out' },
  bin: { section: 'bottom', port: 'in' },
  bout: { section: 'bottom', port: 'out' }
};

/**
 * Parses a single tag entry such as `hot_in2`, `col_tout` or `sig_tc`.
 *
 * @returns the typed entry, or null when the text is not a valid entry
 */
export function parseTagEntry(raw: string): TagEntry | null {
  const match = TAG_ENTRY_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, kind, qualifier] = match;

  switch (kind) {
    case 'hot':
    case 'cold': {
      const heat = HEAT_QUALIFIER_PATTERN.exec(qualifier);
      if (!heat) return null;
      const port = heat[1] === 'in' ? 'in' : 'out';
      const group = heat[2] === undefined ? null : parseInt(heat[2], 10);
      return { kind: 'heat', tag: { side: kind === 'hot' ? 'hot' : 'cold', port, group } };
    }
    case 'col': {
      const tag = COLUMN_QUALIFIERS[qualifier];
      return tag ? { kind: 'column', tag: { ...tag } } : null;
    }
    case 'sig':
      return { kind: 'signal', tag: { label: qualifier } };
    default:
      return { kind: 'other', raw };
  }
}

/**
 * Parses the content of a tag block (without braces).
 *
 * @returns the entries, or the position within `content` of the first bad entry
 */
export function parseTagBlock(content: string): TagEntry[] | { errorAt: number } {
  if (content === '') {
    return [];
  }
  const entries: TagEntry[] = [];
  let position = 0;
  for (const raw of content.split(TAG_SEPARATOR)) {
    const entry = parseTagEntry(raw);
    if (entry === null) {
      return { errorAt: position };
    }
    entries.push(entry);
    position += raw.length + 1;
  }
  return entries;
}

export function parseUnitLabel(text: string): UnitLabel | null {
  const match = UNIT_LABEL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return {
    type: match[1],
    index: match[2] === undefined ? null : parseInt(match[2], 10),
    subIndex: match[3] === undefined ? null : parseInt(match[3], 10)
  };
}

export function isValidUnitType(type: string): boolean {
  const label = parseUnitLabel(type);
  return label !== null && label.index === null;
}

export function emptyTags(): StreamTags {
  return { heatIntegration: [], column: [], signal: [], other: [] };
}

export function cloneTags(tags: StreamTags): StreamTags {
  return {
    heatIntegration: tags.heatIntegration.map(tag => ({ ...tag })),
    column: tags.column.map(tag => ({ ...tag })),
    signal: tags.signal.map(tag => ({ ...tag })),
    other: [...tags.other]
  };
}

export function freezeTags(tags: StreamTags): void {
  const lists: object[][] = [tags.heatIntegration, tags.column, tags.signal];
  for (const list of lists) {
    list.forEach(tag => Object.freeze(tag));
    Object.freeze(list);
  }
  Object.freeze(tags.other);
  Object.freeze(tags);
}

export function appendTagEntry(tags: StreamTags, entry: TagEntry): void {
  switch (entry.kind) {
    case 'heat':
      tags.heatIntegration.push({ ...entry.tag });
      break;
    case 'column':
      tags.column.push({ ...entry.tag });
      break;
    case 'signal':
      tags.signal.push({ ...entry.tag });
      break;
    case 'other':
      tags.other.push(entry.raw);
      break;
  }
}

export function tagsFromEntries(entries: readonly TagEntry[]): StreamTags {
  const tags = emptyTags();
  for (const entry of entries) {
    appendTagEntry(tags, entry);
  }
  return tags;
}

export function tagCount(tags: StreamTags): number {
  return tags.heatIntegration.length + tags.column.length + tags.signal.length + tags.other.length;
}

export function hasTags(tags: StreamTags): boolean {
  return tagCount(tags) > 0;
}

/**
 * Lists the entries of a tag record in block order: heat integration,
 * column, signal, then unrecognised entries.
 *
 * @param groupNumber - maps a stored group id to the id to render; null drops it
 */
export function tagsToEntries(
  tags: StreamTags,
  groupNumber: (group: number) => number | null = group => group
): TagEntry[] {
  const entries: TagEntry[] = [];
  for (const tag of tags.heatIntegration) {
    const group = tag.group === null ? null : groupNumber(tag.group);
    entries.push({ kind: 'heat', tag: { side: tag.side, port: tag.port, group } });
  }
  for (const tag of tags.column) {
    entries.push({ kind: 'column', tag: { ...tag } });
  }
  for (const tag of tags.signal) {
    entries.push({ kind: 'signal', tag: { ...tag } });
  }
  for (const raw of tags.other) {
    entries.push({ kind: 'other', raw });
  }
  return entries;
}

export function tagEntryToString(entry: TagEntry): string {
  switch (entry.kind) {
    case 'heat':
      return `${entry.tag.side}_${entry.tag.port}${entry.tag.group ?? ''}`;
    case 'column':
      return `col_${entry.tag.section === 'top' ? 't' : 'b'}${entry.tag.port}`;
    case 'signal':
      return `sig_${entry.tag.label}`;
    case 'other':
      return entry.raw;
  }
}

export function tagBlockToString(entries: readonly TagEntry[]): string {
  return `{${entries.map(tagEntryToString).join(TAG_SEPARATOR)}}`;
}

/**
 * The exchanger a heat-integration tag refers to: an inlet tag names the
 * stream's destination, an outlet tag its source.
 */
export function exchangerEnd(tag: HeatIntegrationTag, stream: { src: number; dst: number }): number {
  return tag.port === 'in' ? stream.dst : stream.src;
}
