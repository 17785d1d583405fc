import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import * as sfiles from '../index.js';
import { flowsheet, randomFlowsheet, relabelled, seededRandom, streamSummary } from './helpers.js';
import type { StreamSpec } from './helpers.js';

const ELEVEN_CYCLES =
  '(raw)(r)<1(r)<2(r)<3(r)<4(r)<5(r)<6(r)<7(r)<8(r)<9(r)<%10(r)<%11(sep)123456789%10%11';

// Strings already in canonical form, without numbering
const CANONICAL = [
  '(raw)(r)(hex){hot_in}(sep)(prod)',
  '(raw)[(r)](hex)(sep)(prod)',
  '(raw)(r)<1(sep)1(prod)',
  '(raw)<&|(raw)&|(mix)(prod)',
  '(raw)(r)<_1(prod)n|(C)_1{sig_tc}',
  '(raw)(dist){col_tin}[(prod){col_tout}](prod){col_bout}',
  '(raw)(r)(prod)n|(raw)(prod)',
  ELEVEN_CYCLES
];

function removeNumbering(input: string): string {
  return sfiles.encode(sfiles.parse(input), { removeNumbering: true });
}

describe('Encoder', () => {
  test('a tagged path keeps its tag after the unit', () => {
    const graph = sfiles.parse('(raw)(r)(hex){hot_in}(sep)(prod)');
    assert.equal(sfiles.encode(graph), '(raw-1)(r-1)(hex-1){hot_in}(sep-1)(prod-1)');
    assert.equal(sfiles.encode(graph, { removeNumbering: true }), '(raw)(r)(hex){hot_in}(sep)(prod)');
  });

  test('the lower-ranked child continues the main line', () => {
    const graph = sfiles.parse('(raw)[(r)](hex)(sep)(prod)');
    assert.equal(sfiles.encode(graph), '(raw-1)[(r-1)](hex-1)(sep-1)(prod-1)');
  });

  test('a recycle takes cycle number 1', () => {
    const graph = flowsheet(
      ['raw-1', 'r-1', 'sep-1', 'prod-1'],
      [['raw-1', 'r-1'], ['r-1', 'sep-1'], ['sep-1', 'prod-1'], ['sep-1', 'r-1']]
    );
    assert.equal(sfiles.encode(graph), '(raw-1)(r-1)<1(sep-1)1(prod-1)');
    assert.equal(sfiles.encode(graph, { removeNumbering: true }), '(raw)(r)<1(sep)1(prod)');
  });

  test('eleven open cycles switch to two-digit numbers', () => {
    const tokens = sfiles.encodeTokens(sfiles.parse(ELEVEN_CYCLES), { removeNumbering: true });
    assert.equal(sfiles.tokensToString(tokens), ELEVEN_CYCLES);
    const opens = tokens.filter(token => token.kind === 'CYCLE_OPEN').map(token => token.text);
    assert.deepEqual(opens.slice(-3), ['<9', '<%10', '<%11']);
  });

  test('more than 99 cycle numbers cannot be written', () => {
    const reactors = Array.from({ length: 100 }, (_, i) => `r-${i + 1}`);
    const streams: StreamSpec[] = [['raw-1', 'r-1']];
    for (let i = 1; i < reactors.length; i++) {
      streams.push([reactors[i - 1], reactors[i]]);
    }
    streams.push([reactors[reactors.length - 1], 'sep-1']);
    for (const reactor of reactors) {
      streams.push(['sep-1', reactor]);
    }
    const graph = flowsheet(['raw-1', ...reactors, 'sep-1'], streams);
    assert.throws(() => sfiles.encode(graph), sfiles.UnencodableGraphError);
  });

  test('closed cycle numbers are reused', () => {
    const input = '(raw)(a)<1(b)1(c)<1(d)1(prod)';
    assert.equal(removeNumbering(input), input);
    assert.equal(sfiles.encode(sfiles.parse(input)), '(raw-1)(a-1)<1(b-1)1(c-1)<1(d-1)1(prod-1)');
  });

  test('a hundred cycles in sequence need only one number', () => {
    const input = `(raw)${'(a)<1(b)1'.repeat(100)}(prod)`;
    assert.equal(removeNumbering(input), input);
  });

  test('a second source joins as an incoming branch', () => {
    const graph = sfiles.parse('(raw)<&|(raw)&|(mix)(prod)');
    assert.equal(sfiles.encode(graph), '(raw-1)<&|(raw-2)&|(mix-1)(prod-1)');
  });

  test('components are ordered by their sources', () => {
    assert.equal(removeNumbering('(raw)(prod)n|(raw)(r)(prod)'), '(raw)(r)(prod)n|(raw)(prod)');
    assert.equal(
      sfiles.encode(sfiles.parse('(raw)(prod)n|(raw)(r)(prod)')),
      '(raw-1)(r-1)(prod-1)n|(raw-2)(prod-2)'
    );
  });

  test('an untagged child continues the main line', () => {
    assert.equal(removeNumbering('(raw)[(prod)](prod){hot_in}'), '(raw)[(prod){hot_in}](prod)');
    assert.equal(
      sfiles.encode(sfiles.parse('(raw)[(prod)](prod){hot_in}')),
      '(raw-1)[(prod-1){hot_in}](prod-2)'
    );
  });

  test('column tags order tied children', () => {
    const input = '(raw)(dist){col_tin}[(prod){col_tout}](prod){col_bout}';
    assert.equal(removeNumbering(input), input);
  });

  test('signal streams follow the material traversal', () => {
    assert.equal(
      sfiles.encode(sfiles.parse('(raw)(r)<_1(prod)n|(C)_1{sig_tc}')),
      '(raw-1)(r-1)<_1(prod-1)n|(C-1)_1{sig_tc}'
    );
  });

  test('signal partners tell structurally equal siblings apart', () => {
    const expected = '(raw-1)[(u-1)<_1](u-2)n|(raw-2)(u-3){hot_in}n|(raw-3)_1{hot_in}';
    assert.equal(sfiles.encode(sfiles.parse(expected)), expected);

    for (const target of ['u-1', 'u-2']) {
      const graph = flowsheet(
        ['raw-3', 'u-2', 'raw-1', 'u-3', 'u-1', 'raw-2'],
        [
          ['raw-3', target, 'hot_in', 'signal'],
          ['raw-2', 'u-3', 'hot_in'],
          ['raw-1', 'u-2'],
          ['raw-1', 'u-1']
        ]
      );
      assert.equal(sfiles.encode(graph), expected);
    }
  });

  test('symmetric controllers are numbered the same way under any labelling', () => {
    const expected = '(raw-1)[(u-1)<_1](u-2)<_2n|(C-1)_1n|(C-2)_2';
    for (const [first, second] of [['u-1', 'u-2'], ['u-2', 'u-1']]) {
      const graph = flowsheet(
        ['raw-1', 'u-1', 'u-2', 'C-1', 'C-2'],
        [
          ['raw-1', 'u-1'],
          ['raw-1', 'u-2'],
          ['C-1', first, '', 'signal'],
          ['C-2', second, '', 'signal']
        ]
      );
      assert.equal(sfiles.encode(graph), expected);
    }
    assert.equal(sfiles.encode(sfiles.parse(expected)), expected);
  });

  test('cycle tags follow the source-end marker', () => {
    assert.equal(
      sfiles.encode(sfiles.parse('(raw)(r)<1{col_bout}(sep)1(prod)')),
      '(raw-1)(r-1)<1(sep-1)1{col_bout}(prod-1)'
    );
  });

  test('token offsets locate every token in the output', () => {
    const tokens = sfiles.encodeTokens(sfiles.parse('(raw)(r)<1(sep)1(prod)'), { removeNumbering: true });
    assert.deepEqual(tokens.map(token => token.offset), [0, 5, 8, 10, 15, 16]);
  });

  test('non-canonical encoding follows insertion order', () => {
    const graph = sfiles.parse('(raw)(prod)n|(raw)(r)(prod)');
    assert.equal(sfiles.encode(graph, { canonical: false }), '(raw-1)(prod-1)n|(raw-2)(r-1)(prod-2)');
  });

  test('empty graph encodes to an empty string', () => {
    assert.equal(sfiles.encode(new sfiles.FlowsheetGraph()), '');
  });

  test('defaults are v2, canonical and numbered', () => {
    assert.deepEqual(sfiles.DEFAULT_ENCODE_OPTIONS, { version: 'v2', canonical: true, removeNumbering: false });
  });

  describe('version 1', () => {
    const input = '(raw)(r)<1(sep)1{col_bout}(prod)';

    test('drops tag blocks', () => {
      assert.equal(sfiles.encode(sfiles.parse(input), { version: 'v1' }), '(raw-1)(r-1)<1(sep-1)1(prod-1)');
    });

    test('loses exactly the tags', () => {
      const graph = sfiles.parse(input);
      const legacy = sfiles.parse(sfiles.encode(graph, { version: 'v1' }), { version: 'v1' });
      assert.equal(legacy.size, graph.size);
      assert.deepEqual(streamSummary(legacy, false), streamSummary(graph, false));
      assert.ok(legacy.getStreams().every(stream => stream.tags.column.length === 0));
    });
  });

  describe('preconditions', () => {
    test('two material streams between the same units', () => {
      const graph = flowsheet(['raw-1', 'prod-1'], [['raw-1', 'prod-1'], ['raw-1', 'prod-1']]);
      assert.throws(() => sfiles.encode(graph), sfiles.UnencodableGraphError);
    });

    test('two signal streams between the same units', () => {
      const graph = flowsheet(
        ['raw-1', 'prod-1', 'C-1'],
        [['raw-1', 'prod-1'], ['C-1', 'prod-1', '', 'signal'], ['C-1', 'prod-1', '', 'signal']]
      );
      assert.throws(() => sfiles.encode(graph), sfiles.UnencodableGraphError);
    });

    test('a cycle with no source', () => {
      assert.throws(() => sfiles.encode(sfiles.parse('(a)<1(b)1')), sfiles.UnencodableGraphError);
    });

    test('the input graph is left untouched', () => {
      const graph = sfiles.parse('(raw)(hex){hot_in1}(prod){hot_out1}n|(raw)(hex){cold_in1}(prod){cold_out1}');
      sfiles.encode(graph);
      assert.equal(graph.size, 6);
      assert.equal(graph.isFrozen, true);
    });
  });

  describe('properties', () => {
    test('canonical strings reproduce themselves', () => {
      for (const input of CANONICAL) {
        assert.equal(removeNumbering(input), input, input);
      }
    });

    test('round trip keeps units, streams and tags', () => {
      for (const input of CANONICAL) {
        const graph = sfiles.parse(input);
        const decoded = sfiles.parse(sfiles.encode(graph));
        assert.equal(decoded.size, graph.size, input);
        assert.deepEqual(streamSummary(decoded), streamSummary(graph), input);
      }
    });

    test('re-encoding is idempotent', () => {
      for (const input of CANONICAL) {
        const once = sfiles.encode(sfiles.parse(input));
        assert.equal(sfiles.encode(sfiles.parse(once)), once, input);
      }
    });

    test('random flowsheets encode the same under any labelling', () => {
      const random = seededRandom(20240611);
      for (let run = 0; run < 200; run++) {
        const { units, streams } = randomFlowsheet(random);
        const graph = flowsheet(units, streams);
        const encoded = sfiles.encode(graph);
        const context = `${run}: ${encoded}`;

        for (let copy = 0; copy < 3; copy++) {
          const shuffled = relabelled(units, streams, random);
          assert.equal(sfiles.encode(flowsheet(shuffled.units, shuffled.streams)), encoded, context);
        }

        const decoded = sfiles.parse(encoded);
        assert.equal(sfiles.encode(decoded), encoded, context);
        assert.equal(decoded.size, graph.size, context);
        assert.deepEqual(streamSummary(decoded), streamSummary(graph), context);
      }
    });

    test('insertion order does not change the encoding', () => {
      const units = ['raw-1', 'r-1', 'sep-1', 'prod-1', 'prod-2', 'C-1'];
      const streams: StreamSpec[] = [
        ['raw-1', 'r-1'],
        ['r-1', 'sep-1'],
        ['sep-1', 'r-1', 'col_bin'],
        ['sep-1', 'prod-1'],
        ['sep-1', 'prod-2', 'hot_in'],
        ['C-1', 'r-1', '', 'signal']
      ];
      const expected = '(raw-1)(r-1)<1<_1(sep-1)1{col_bin}[(prod-1){hot_in}](prod-2)n|(C-1)_1';

      assert.equal(sfiles.encode(flowsheet(units, streams)), expected);
      assert.equal(sfiles.encode(flowsheet([...units].reverse(), [...streams].reverse())), expected);
      assert.equal(
        sfiles.encode(flowsheet(
          ['prod-2', 'C-1', 'sep-1', 'raw-1', 'prod-1', 'r-1'],
          [streams[4], streams[2], streams[5], streams[0], streams[3], streams[1]]
        )),
        expected
      );
    });
  });
});
