/**
 * Bijective mapping between unit operation names and SFILES unit codes
 */

import { isValidUnitType } from './tag-rules.js';
import type { UnitCodeLookup } from './types.js';

export class UnitVocabulary implements UnitCodeLookup {
  private readonly nameToCode = new Map<string, string>();
  private readonly codeToName = new Map<string, string>();

  /**
   * @param entries - `[name, code]` pairs; names and codes must each be unique
   * @throws Error when a code is not a valid unit type or the mapping is not one-to-one
   */
  constructor(entries: Iterable<readonly [string, string]>) {
    for (const [name, code] of entries) {
      if (!isValidUnitType(code)) {
        throw new Error(`Invalid unit code '${code}' for '${name}'`);
      }
      if (this.nameToCode.has(name)) {
        throw new Error(`Unit name '${name}' is mapped twice`);
      }
      if (this.codeToName.has(code)) {
        throw new Error(`Unit code '${code}' is used by both '${this.codeToName.get(code)}' and '${name}'`);
      }
      this.nameToCode.set(name, code);
      this.codeToName.set(code, name);
    }
  }

  get size(): number {
    return this.nameToCode.size;
  }

  hasCode(code: string): boolean {
    return this.codeToName.has(code);
  }

  hasName(name: string): boolean {
    return this.nameToCode.has(name);
  }

  toCode(name: string): string {
    const code = this.nameToCode.get(name);
    if (code === undefined) {
      throw new Error(`Unknown unit name '${name}'`);
    }
    return code;
  }

  toName(code: string): string {
    const name = this.codeToName.get(code);
    if (name === undefined) {
      throw new Error(`Unknown unit code '${code}'`);
    }
    return name;
  }

  codes(): string[] {
    return [...this.codeToName.keys()];
  }

  names(): string[] {
    return [...this.nameToCode.keys()];
  }

  /**
   * Returns a new vocabulary with the given entries added.
   */
  extend(entries: Iterable<readonly [string, string]>): UnitVocabulary {
    return new UnitVocabulary([...this.nameToCode.entries(), ...entries]);
  }
}

export const DEFAULT_UNIT_VOCABULARY = new UnitVocabulary([
  ['Feed', 'raw'],
  ['Product', 'prod'],
  ['Reactor', 'r'],
  ['HeatExchanger', 'hex'],
  ['Separator', 'sep'],
  ['DistillationColumn', 'dist'],
  ['FlashDrum', 'flash'],
  ['Splitter', 'splt'],
  ['Mixer', 'mix'],
  ['Pump', 'pp'],
  ['Compressor', 'comp'],
  ['Valve', 'v'],
  ['AbsorptionColumn', 'abs'],
  ['Controller', 'C'],
  ['Tank', 'tank'],
  ['Centrifuge', 'cent'],
  ['Filter', 'filt']
]);
