/**
 * Utility functions for working with SFILES strings
 */

import { tokenize } from '../tokenizer.js';

/**
 * Returns the number of tokens in a given SFILES string.
 *
 * @example
 * ```typescript
 * import { lenSfiles } from 'sfiles';
 * console.log(lenSfiles("(raw)(r)<1(sep)1(prod)")); // 6
 * ```
 */
export function lenSfiles(sfiles: string): number {
  return tokenize(sfiles).length;
}

/**
 * Splits an SFILES string into the text of its tokens.
 *
 * @param sfiles - An SFILES string
 * @yields The tokens of the SFILES string one-by-one with order preserved
 *
 * @example
 * ```typescript
 * import { splitSfiles } from 'sfiles';
 * console.log([...splitSfiles("(raw)[(r)](prod){hot_in}")]);
 * // ['(raw)', '[', '(r)', ']', '(prod)', '{hot_in}']
 * ```
 */
export function* splitSfiles(sfiles: string): Generator<string> {
  for (const token of tokenize(sfiles)) {
    yield token.text;
  }
}

/**
 * Collects the unit types used by an iterable of SFILES strings.
 *
 * @example
 * ```typescript
 * import { getUnitTypesFromSfiles } from 'sfiles';
 * const types = getUnitTypesFromSfiles(["(raw)(r)(prod)", "(raw-2)(hex-1/1)"]);
 * console.log([...types].sort()); // ['hex', 'prod', 'r', 'raw']
 * ```
 */
export function getUnitTypesFromSfiles(sfilesIter: Iterable<string>): Set<string> {
  const types = new Set<string>();

  for (const sfiles of sfilesIter) {
    for (const token of tokenize(sfiles)) {
      if (token.kind === 'NODE') {
        types.add(token.unit.type);
      }
    }
  }

  return types;
}
