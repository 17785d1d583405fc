/**
 * SFILES: a line notation for chemical process flowsheets.
 *
 * SFILES (Simplified Flowsheet Input-Line Entry System) writes a process
 * flowsheet as a single string, much as SMILES writes a molecule: units are
 * tokens, streams are adjacency, branches and recycles use brackets and
 * numbered markers. Version 2 adds tag blocks for heat integration, column
 * connections and signal annotations.
 *
 * The encoder produces a canonical string, so two flowsheets with the same
 * structure encode identically whatever order their units were recorded in.
 *
 * Typical usage example:
 *     import * as sfiles from 'sfiles';
 *
 *     const graph = sfiles.parse("(raw)(r)<1(sep)1(prod)");
 *     const canonical = sfiles.encode(graph);
 *     const template = sfiles.encode(graph, { removeNumbering: true });
 */

export const version = "0.1.0";

// Core parsing/encoding functions
export { parse, buildGraph, renumber } from './parser.js';
export { encode, encodeTokens, DEFAULT_ENCODE_OPTIONS } from './encoder.js';
export { tokenize, tokensToString } from './tokenizer.js';
export { computeRanks, refineRanks } from './invariant-ranker.js';

// Heat integration
export {
  collectHeatIntegrationGroups,
  validateHeatIntegration,
  normalizeHeatIntegration
} from './heat-integration.js';
export type { HeatIntegrationGroup, HeatIntegrationParticipation } from './heat-integration.js';

// Exception classes
export {
  SFILESError,
  MalformedSyntaxError,
  MalformedTopologyError,
  AmbiguousHeatIntegrationError,
  UnencodableGraphError
} from './exceptions.js';

// Unit vocabulary
export { UnitVocabulary, DEFAULT_UNIT_VOCABULARY } from './vocabulary.js';

// Utility functions
export {
  lenSfiles,
  splitSfiles,
  getUnitTypesFromSfiles
} from './utils/sfiles-utils.js';

export { graphFromGraphml, graphToGraphml } from './utils/graphml-utils.js';

export {
  parseTagEntry,
  tagEntryToString,
  emptyTags
} from './tag-rules.js';

// Export types for TypeScript users
export type {
  SfilesVersion,
  StreamKind,
  HeatSide,
  Port,
  ColumnSection,
  HeatIntegrationTag,
  ColumnTag,
  SignalTag,
  StreamTags,
  TagEntry,
  UnitLabel,
  Token,
  TokenKind,
  ParseOptions,
  EncodeOptions,
  HeatIntegrationMode,
  UnitCodeLookup
} from './types.js';

// Export flowsheet graph classes for advanced users
export {
  UnitOperation,
  Stream,
  FlowsheetGraph
} from './flowsheet-graph.js';
export type { UnitNumbering } from './flowsheet-graph.js';
