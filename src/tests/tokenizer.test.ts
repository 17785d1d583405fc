import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import * as sfiles from '../index.js';

function kinds(input: string): string[] {
  return sfiles.tokenize(input).map(token => token.kind);
}

function syntaxErrorAt(input: string, offset: number): void {
  assert.throws(
    () => sfiles.tokenize(input),
    (error: unknown) => error instanceof sfiles.MalformedSyntaxError && error.offset === offset
  );
}

describe('Tokenizer', () => {
  test('units and branches', () => {
    assert.deepEqual(kinds('(raw)[(r)](prod)'), ['NODE', 'BRANCH_OPEN', 'NODE', 'BRANCH_CLOSE', 'NODE']);
  });

  test('cycle markers carry their number and offset', () => {
    const tokens = sfiles.tokenize('(raw)(r)<1(sep)1(prod)');
    assert.deepEqual(tokens.map(t => t.text), ['(raw)', '(r)', '<1', '(sep)', '1', '(prod)']);
    const open = tokens[2];
    assert.equal(open.kind, 'CYCLE_OPEN');
    assert.equal(open.offset, 8);
    if (open.kind === 'CYCLE_OPEN') {
      assert.equal(open.index, 1);
    }
    assert.equal(tokens[4].kind, 'CYCLE_CLOSE');
    assert.equal(tokens[4].offset, 15);
  });

  test('two-digit markers use the percent form', () => {
    const tokens = sfiles.tokenize('(a)<%10(b)%10');
    assert.deepEqual(tokens.map(t => t.text), ['(a)', '<%10', '(b)', '%10']);
    const close = tokens[3];
    assert.equal(close.offset, 10);
    assert.ok(close.kind === 'CYCLE_CLOSE' && close.index === 10);
  });

  test('signal markers', () => {
    assert.deepEqual(kinds('(C)<_1(v)_1'), ['NODE', 'SIGNAL_OPEN', 'NODE', 'SIGNAL_CLOSE']);
    const tokens = sfiles.tokenize('(C)<_%12(v)_%12');
    assert.deepEqual(tokens.map(t => t.text), ['(C)', '<_%12', '(v)', '_%12']);
  });

  test('incoming branches and separators', () => {
    assert.deepEqual(
      kinds('<&|(raw)&|(mix)n|(raw)'),
      ['INCOMING_BRANCH_OPEN', 'NODE', 'INCOMING_BRANCH_CLOSE', 'NODE', 'COMPONENT_SEPARATOR', 'NODE']
    );
  });

  test('unit labels keep their literal numbering', () => {
    const [token] = sfiles.tokenize('(hex-2/1)');
    assert.ok(token.kind === 'NODE');
    assert.deepEqual(token.unit, { type: 'hex', index: 2, subIndex: 1 });
  });

  test('tag blocks are parsed into typed entries', () => {
    const tokens = sfiles.tokenize('(raw)(hex){hot_in1;col_tout;sig_tc;foo_bar}');
    const block = tokens[2];
    assert.ok(block.kind === 'TAG_BLOCK');
    assert.deepEqual(block.entries, [
      { kind: 'heat', tag: { side: 'hot', port: 'in', group: 1 } },
      { kind: 'column', tag: { section: 'top', port: 'out' } },
      { kind: 'signal', tag: { label: 'tc' } },
      { kind: 'other', raw: 'foo_bar' }
    ]);
  });

  test('tokens concatenate back to the input', () => {
    const input = '(raw)<&|(raw)&|{hot_in1}(hex){cold_in1}[(prod){hot_out1}](prod)<_1n|(C)_1';
    assert.equal(sfiles.tokensToString(sfiles.tokenize(input)), input);
  });

  test('empty string has no tokens', () => {
    assert.deepEqual(sfiles.tokenize(''), []);
  });

  describe('malformed input', () => {
    test('whitespace is rejected', () => syntaxErrorAt('(raw) (r)', 5));
    test('unclosed branch', () => syntaxErrorAt('(raw)[(r)', 5));
    test('unmatched branch close', () => syntaxErrorAt('(raw)](r)', 5));
    test('mismatched bracket kinds', () => syntaxErrorAt('(raw)<&|(r)]', 11));
    test('two-digit marker below 10', () => syntaxErrorAt('(raw)%05', 5));
    test('tag block at the start', () => syntaxErrorAt('{hot_in}(raw)', 0));
    test('known tag kind with a bad qualifier', () => syntaxErrorAt('(raw)(hex){hot_up}', 11));
    test('entry without a qualifier', () => syntaxErrorAt('(raw)(hex){hot_in;bad}', 18));
    test('invalid unit label', () => syntaxErrorAt('(1raw)', 0));
    test('separator inside a branch', () => syntaxErrorAt('(raw)[(r)n|(p)]', 9));
    test('unknown character', () => syntaxErrorAt('(raw)x', 5));
    test('unclosed unit token', () => syntaxErrorAt('(raw', 0));
    test('cycle open without a number', () => syntaxErrorAt('(raw)<x', 6));
  });

  test('syntax errors point at the offending character', () => {
    try {
      sfiles.tokenize('(raw) (r)');
      assert.fail('expected an error');
    } catch (error) {
      assert.ok(error instanceof sfiles.MalformedSyntaxError);
      assert.equal(error.sfiles, '(raw) (r)');
      assert.equal(error.reason, 'whitespace is not allowed in SFILES');
      assert.ok(error.message.includes('\n             ^'));
    }
  });
});
