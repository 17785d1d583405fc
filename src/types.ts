/**
 * Type definitions for the SFILES codec
 */

// Schema versions: v1 carries no tag blocks, v2 adds them
export type SfilesVersion = "v1" | "v2";

export type StreamKind = "material" | "signal";

export type HeatSide = "hot" | "cold";
export type Port = "in" | "out";
export type ColumnSection = "top" | "bottom";

export interface HeatIntegrationTag {
  side: HeatSide;
  port: Port;
  // null for an annotation that names no exchanger group
  group: number | null;
}

export interface ColumnTag {
  section: ColumnSection;
  port: Port;
}

export interface SignalTag {
  label: string;
}

export interface StreamTags {
  heatIntegration: HeatIntegrationTag[];
  column: ColumnTag[];
  signal: SignalTag[];
  other: string[];
}

export type TagEntry =
  | { kind: "heat"; tag: HeatIntegrationTag }
  | { kind: "column"; tag: ColumnTag }
  | { kind: "signal"; tag: SignalTag }
  | { kind: "other"; raw: string };

// Unit label as written inside a NODE token, before renumbering
export interface UnitLabel {
  type: string;
  index: number | null;
  subIndex: number | null;
}

export type StructuralTokenKind =
  | "BRANCH_OPEN"
  | "BRANCH_CLOSE"
  | "INCOMING_BRANCH_OPEN"
  | "INCOMING_BRANCH_CLOSE"
  | "COMPONENT_SEPARATOR";

export type MarkerTokenKind =
  | "CYCLE_OPEN"
  | "CYCLE_CLOSE"
  | "SIGNAL_OPEN"
  | "SIGNAL_CLOSE";

export type Token =
  | { readonly kind: "NODE"; readonly text: string; readonly offset: number; readonly unit: UnitLabel }
  | { readonly kind: StructuralTokenKind; readonly text: string; readonly offset: number }
  | { readonly kind: MarkerTokenKind; readonly text: string; readonly offset: number; readonly index: number }
  | { readonly kind: "TAG_BLOCK"; readonly text: string; readonly offset: number; readonly entries: readonly TagEntry[] };

export type TokenKind = Token["kind"];

export type MarkerToken = Extract<Token, { kind: MarkerTokenKind }>;

// Options for parsing
export interface ParseOptions {
  version?: SfilesVersion;
  vocabulary?: UnitCodeLookup;
}

// Options for encoding
export interface EncodeOptions {
  version?: SfilesVersion;
  canonical?: boolean;
  removeNumbering?: boolean;
}

export type ResolvedEncodeOptions = Required<EncodeOptions>;

export type HeatIntegrationMode = "merge" | "split";

// Anything that can tell whether a unit code is known
export interface UnitCodeLookup {
  hasCode(code: string): boolean;
}
