/**
 * Tokenizer for SFILES strings
 */

import { MalformedSyntaxError } from './exceptions.js';
import { parseTagBlock, parseUnitLabel } from './tag-rules.js';
import type { MarkerTokenKind, Token, TokenKind } from './types.js';

// Token kinds a tag block may directly follow
const TAGGABLE: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'NODE',
  'INCOMING_BRANCH_CLOSE',
  'CYCLE_OPEN',
  'CYCLE_CLOSE',
  'SIGNAL_OPEN',
  'SIGNAL_CLOSE'
]);

interface OpenBracket {
  kind: 'BRANCH_OPEN' | 'INCOMING_BRANCH_OPEN';
  offset: number;
}

/**
 * Splits an SFILES string into its tokens.
 *
 * Only the bracket structure and the lexical form of every token are checked
 * here; pairing of cycle and signal numbers is left to the graph builder.
 *
 * @throws MalformedSyntaxError on any lexical error or unbalanced bracket
 *
 * @example
 * ```typescript
 * tokenize("(raw)[(r)](prod)").map(t => t.kind);
 * // ['NODE', 'BRANCH_OPEN', 'NODE', 'BRANCH_CLOSE', 'NODE']
 * ```
 */
export function tokenize(sfiles: string): Token[] {
  const tokens: Token[] = [];
  const brackets: OpenBracket[] = [];
  let i = 0;

  function fail(reason: string, offset: number = i): never {
    throw new MalformedSyntaxError(sfiles, reason, offset);
  }

  // Reads a cycle or signal number starting at `start`: a digit 1-9 or %10-%99
  const readMarkerIndex = (start: number): [number, number] => {
    const ch = sfiles[start];
    if (ch !== undefined && /[1-9]/.test(ch)) {
      return [parseInt(ch, 10), start + 1];
    }
    if (ch === '%') {
      const digits = sfiles.slice(start + 1, start + 3);
      if (!/^[1-9]\d$/.test(digits)) {
        fail("'%' must be followed by a two-digit number from 10 to 99", start);
      }
      return [parseInt(digits, 10), start + 3];
    }
    return fail('expected a marker number (1-9 or %10-%99)', start);
  };

  const pushMarker = (kind: MarkerTokenKind, start: number, numberAt: number): void => {
    const [index, end] = readMarkerIndex(numberAt);
    tokens.push({ kind, text: sfiles.slice(start, end), offset: start, index });
    i = end;
  };

  while (i < sfiles.length) {
    const ch = sfiles[i];

    if (/\s/.test(ch)) {
      fail('whitespace is not allowed in SFILES');
    }

    switch (ch) {
      case '(': {
        const close = sfiles.indexOf(')', i + 1);
        if (close === -1) {
          fail("unclosed '(' unit token");
        }
        const text = sfiles.slice(i, close + 1);
        const unit = parseUnitLabel(sfiles.slice(i + 1, close));
        if (unit === null) {
          fail(`invalid unit token '${text}'`);
        } else {
          tokens.push({ kind: 'NODE', text, offset: i, unit });
        }
        i = close + 1;
        break;
      }

      case '[':
        brackets.push({ kind: 'BRANCH_OPEN', offset: i });
        tokens.push({ kind: 'BRANCH_OPEN', text: '[', offset: i });
        i++;
        break;

      case ']': {
        const open = brackets.pop();
        if (!open || open.kind !== 'BRANCH_OPEN') {
          fail("unmatched ']'");
        }
        tokens.push({ kind: 'BRANCH_CLOSE', text: ']', offset: i });
        i++;
        break;
      }

      case '<': {
        const next = sfiles[i + 1];
        if (next === '&') {
          if (sfiles[i + 2] !== '|') {
            fail("expected '<&|'");
          }
          brackets.push({ kind: 'INCOMING_BRANCH_OPEN', offset: i });
          tokens.push({ kind: 'INCOMING_BRANCH_OPEN', text: '<&|', offset: i });
          i += 3;
        } else if (next === '_') {
          pushMarker('SIGNAL_OPEN', i, i + 2);
        } else {
          pushMarker('CYCLE_OPEN', i, i + 1);
        }
        break;
      }

      case '&': {
        if (sfiles[i + 1] !== '|') {
          fail("expected '&|'");
        }
        const open = brackets.pop();
        if (!open || open.kind !== 'INCOMING_BRANCH_OPEN') {
          fail("unmatched '&|'");
        }
        tokens.push({ kind: 'INCOMING_BRANCH_CLOSE', text: '&|', offset: i });
        i += 2;
        break;
      }

      case '_':
        pushMarker('SIGNAL_CLOSE', i, i + 1);
        break;

      case '{': {
        const close = sfiles.indexOf('}', i + 1);
        if (close === -1) {
          fail("unclosed '{' tag block");
        }
        const previous = tokens[tokens.length - 1];
        if (!previous || !TAGGABLE.has(previous.kind)) {
          fail('a tag block must follow a unit, an incoming-branch close or a marker');
        }
        const entries = parseTagBlock(sfiles.slice(i + 1, close));
        if (!Array.isArray(entries)) {
          fail('malformed tag entry', i + 1 + entries.errorAt);
        } else {
          tokens.push({ kind: 'TAG_BLOCK', text: sfiles.slice(i, close + 1), offset: i, entries });
        }
        i = close + 1;
        break;
      }

      case 'n': {
        if (sfiles[i + 1] !== '|') {
          fail("expected 'n|'");
        }
        if (brackets.length > 0) {
          fail('component separator inside an open branch');
        }
        tokens.push({ kind: 'COMPONENT_SEPARATOR', text: 'n|', offset: i });
        i += 2;
        break;
      }

      default:
        if (/[1-9%]/.test(ch)) {
          pushMarker('CYCLE_CLOSE', i, i);
        } else {
          fail(`unexpected character '${ch}'`);
        }
    }
  }

  const unclosed = brackets.pop();
  if (unclosed) {
    fail(
      unclosed.kind === 'BRANCH_OPEN' ? "unclosed '['" : "unclosed '<&|'",
      unclosed.offset
    );
  }

  return tokens;
}

export function tokensToString(tokens: readonly Token[]): string {
  return tokens.map(token => token.text).join('');
}
