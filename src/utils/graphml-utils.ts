/**
 * GraphML import and export for flowsheet graphs
 *
 * Node ids are unit names (`raw-1`, `hex-2/1`). Edges carry two data keys:
 * `kind` (`material` or `signal`, material when absent) and `tags`, the
 * content of a tag block (`hot_in1;col_tout`).
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { MalformedSyntaxError, MalformedTopologyError } from '../exceptions.js';
import { FlowsheetGraph } from '../flowsheet-graph.js';
import { hasTags, parseTagBlock, parseUnitLabel, TAG_SEPARATOR, tagEntryToString, tagsFromEntries, tagsToEntries } from '../tag-rules.js';
import type { StreamKind } from '../types.js';

const GRAPHML_NAMESPACE = 'http://graphml.graphdrawing.org/xmlns';
const KIND_KEY = 'kind';
const TAGS_KEY = 'tags';

type XmlObject = Record<string, unknown>;

function isXmlObject(value: unknown): value is XmlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function attribute(value: unknown, name: string): string | undefined {
  if (!isXmlObject(value)) return undefined;
  const attr = value[`@_${name}`];
  return attr === undefined ? undefined : String(attr);
}

function extractText(value: unknown): string | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isXmlObject(value) && value['#text'] !== undefined) {
    return String(value['#text']);
  }
  return undefined;
}

/**
 * Reads `<data>` children into a map keyed by attribute name.
 */
function readData(element: unknown, keyMap: Map<string, string>): Map<string, string> {
  const data = new Map<string, string>();
  if (!isXmlObject(element)) return data;

  for (const item of asArray(element.data)) {
    const key = attribute(item, 'key');
    if (key === undefined) continue;
    data.set(keyMap.get(key) ?? key, extractText(item) ?? '');
  }
  return data;
}

function parseKind(raw: string | undefined, edge: string): StreamKind {
  if (raw === undefined || raw === 'material') return 'material';
  if (raw === 'signal') return 'signal';
  throw new MalformedSyntaxError(raw, `unknown stream kind on edge ${edge}`, 0);
}

/**
 * Builds a flowsheet graph from a GraphML document.
 *
 * Units are added in document order; a node id without an index takes the
 * next free index of its type. The returned graph is not frozen.
 *
 * @throws MalformedSyntaxError for a node id that is not a unit name, an
 *   unknown stream kind or a malformed tag entry
 * @throws MalformedTopologyError for an edge naming an unknown unit
 */
export function graphFromGraphml(text: string): FlowsheetGraph {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false
  });
  const doc: unknown = parser.parse(text);
  const graph = new FlowsheetGraph();
  const graphml = isXmlObject(doc) ? doc.graphml : undefined;
  if (!isXmlObject(graphml)) {
    return graph;
  }

  const keyMap = new Map<string, string>();
  for (const key of asArray(graphml.key)) {
    const id = attribute(key, 'id');
    const name = attribute(key, 'attr.name');
    if (id !== undefined && name !== undefined) {
      keyMap.set(id, name);
    }
  }

  const roots = asArray(graphml.graph).filter(isXmlObject);

  for (const root of roots) {
    for (const node of asArray(root.node)) {
      const id = attribute(node, 'id') ?? '';
      const label = parseUnitLabel(id);
      if (label === null) {
        throw new MalformedSyntaxError(id, 'node id is not a unit name', 0);
      }
      graph.addUnit(label.type, label.index ?? undefined, label.subIndex);
    }
  }

  for (const root of roots) {
    for (const edge of asArray(root.edge)) {
      const source = attribute(edge, 'source') ?? '';
      const target = attribute(edge, 'target') ?? '';
      const src = graph.findUnit(source);
      const dst = graph.findUnit(target);
      if (src === null || dst === null) {
        throw new MalformedTopologyError(`edge ${source} -> ${target} names an unknown unit`);
      }

      const data = readData(edge, keyMap);
      const kind = parseKind(data.get(KIND_KEY), `${source} -> ${target}`);
      const tagText = data.get(TAGS_KEY) ?? '';
      const entries = parseTagBlock(tagText);
      if (!Array.isArray(entries)) {
        throw new MalformedSyntaxError(tagText, 'malformed tag entry', entries.errorAt);
      }
      graph.addStream(src.id, dst.id, kind, tagsFromEntries(entries));
    }
  }

  return graph;
}

/**
 * Serializes a flowsheet graph as a GraphML document.
 */
export function graphToGraphml(graph: FlowsheetGraph): string {
  const nodes = graph.getUnits().map(unit => ({ '@_id': unit.name }));
  const edges = graph.getStreams().map(stream => {
    const data: XmlObject[] = [{ '@_key': KIND_KEY, '#text': stream.kind }];
    if (hasTags(stream.tags)) {
      data.push({
        '@_key': TAGS_KEY,
        '#text': tagsToEntries(stream.tags).map(tagEntryToString).join(TAG_SEPARATOR)
      });
    }
    return {
      '@_source': graph.getUnit(stream.src).name,
      '@_target': graph.getUnit(stream.dst).name,
      data
    };
  });

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  });

  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    graphml: {
      '@_xmlns': GRAPHML_NAMESPACE,
      key: [
        { '@_id': KIND_KEY, '@_for': 'edge', '@_attr.name': KIND_KEY, '@_attr.type': 'string' },
        { '@_id': TAGS_KEY, '@_for': 'edge', '@_attr.name': TAGS_KEY, '@_attr.type': 'string' }
      ],
      graph: {
        '@_id': 'G',
        '@_edgedefault': 'directed',
        node: nodes,
        edge: edges
      }
    }
  });
}
