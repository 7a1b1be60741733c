import { describe, test, expect } from 'vitest';
import { parseSync } from '@optique/core/parser';
import { cycleCommand, handleCycle } from './cycle.js';
import { NiriClient } from '../../core/niri-client.js';
import { ErrOutputDisabled } from '../../core/errors/errors.js';
import { fakeNiri, testOutput, testOutputs, testWorkspace } from '../../core/testing.js';

function parseArgs(argv: string[]) {
  const result = parseSync(cycleCommand, argv);
  if (!result.success) throw new Error('Parse failed');
  return result.value;
}

describe('cycleCommand', () => {
  test('defaults to the current output, forwards, no scales', () => {
    const value = parseArgs([]);
    expect(value.scales).toEqual([]);
    expect(value.output).toBe('@current');
    expect(value.direction).toBe('forwards');
    expect(value.dryRun).toBe(false);
    expect(value.niri).toBe('niri');
    expect(value.timeout).toBe(10_000);
    expect(value.verbose).toBe(false);
  });

  test('collects repeated scales in the order given', () => {
    expect(parseArgs(['-s', '2', '--scale', '1', '-s', '1.5']).scales).toEqual([2, 1, 1.5]);
  });

  test('takes output, direction and the boundary options', () => {
    const value = parseArgs([
      '-o', 'DP-2', '--direction', 'backwards', '--dry-run', '--niri', '/opt/niri', '--timeout', '500', '-v',
    ]);
    expect(value.output).toBe('DP-2');
    expect(value.direction).toBe('backwards');
    expect(value.dryRun).toBe(true);
    expect(value.niri).toBe('/opt/niri');
    expect(value.timeout).toBe(500);
    expect(value.verbose).toBe(true);
  });

  test('rejects an unknown direction', () => {
    expect(parseSync(cycleCommand, ['--direction', 'sideways']).success).toBe(false);
  });

  test('rejects scales that are not positive numbers', () => {
    expect(parseSync(cycleCommand, ['-s', 'big']).success).toBe(false);
    expect(parseSync(cycleCommand, ['-s', '0']).success).toBe(false);
    expect(parseSync(cycleCommand, ['-s', '-1.5']).success).toBe(false);
  });

  test('rejects number forms other than plain decimals', () => {
    for (const input of ['0x2', '0b10', '0o7', '1e0', 'Infinity', '', ' ']) {
      expect(parseSync(cycleCommand, ['-s', input]).success).toBe(false);
    }
  });

  test('accepts decimals with a bare leading or trailing point', () => {
    expect(parseArgs(['-s', '.5', '-s', '1.', '-s', ' 1.25 ']).scales).toEqual([0.5, 1, 1.25]);
  });
});

describe('handleCycle', () => {
  const docs = {
    workspaces: [testWorkspace({ output: 'eDP-1', is_focused: true })],
    outputs: testOutputs(testOutput('eDP-1', 1.75), { ...testOutput('DP-2', 1), logical: null }),
  };

  test('sorts the targets before selecting', async () => {
    const niri = fakeNiri(docs);

    const outcome = await handleCycle(
      { scales: [2, 1, 1.5], output: '@current', direction: 'backwards', dryRun: false },
      new NiriClient({ runner: niri.runner }),
    );

    expect(outcome).toEqual({ kind: 'applied', output: 'eDP-1', from: 1.75, to: 1.5 });
    expect(niri.calls.at(-1)).toBe('niri msg output eDP-1 scale 1.5');
  });

  test('a disabled output cannot be cycled', async () => {
    let thrown: unknown;
    try {
      await handleCycle(
        { scales: [1, 2], output: 'DP-2', direction: 'forwards', dryRun: false },
        new NiriClient({ runner: fakeNiri(docs).runner }),
      );
    } catch (err) {
      thrown = err;
    }
    expect(ErrOutputDisabled.is(thrown)).toBe(true);
  });
});
