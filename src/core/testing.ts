/**
 * Test helpers: snapshot builders and an in-process stand-in for the niri binary.
 */

import type { CommandResult, CommandRunner } from './niri-client.js';
import type { NiriOutput, NiriOutputs, NiriWorkspace } from '../types/niri.js';

export function testWorkspace(overrides: Partial<NiriWorkspace> = {}): NiriWorkspace {
  return {
    id: 1,
    idx: 1,
    name: null,
    output: 'eDP-1',
    is_active: true,
    is_focused: false,
    active_window_id: null,
    ...overrides,
  };
}

export function testOutput(name: string, scale: number): NiriOutput {
  return {
    name,
    make: 'Test Make',
    model: 'Test Model',
    serial: null,
    physical_size: [300, 200],
    modes: [{ width: 2560, height: 1600, refresh_rate: 60000, is_preferred: true }],
    current_mode: 0,
    vrr_supported: false,
    vrr_enabled: false,
    logical: { x: 0, y: 0, width: Math.round(2560 / scale), height: Math.round(1600 / scale), scale, transform: 'Normal' },
  };
}

export function testOutputs(...outputs: NiriOutput[]): NiriOutputs {
  return Object.fromEntries(outputs.map((o) => [o.name, o]));
}

export interface FakeNiri {
  runner: CommandRunner;
  /** Every invocation, as `file arg arg ...` */
  calls: string[];
}

/**
 * Answers `msg --json workspaces|outputs` from the given documents and accepts
 * `msg output <name> scale <value>`. Any response can be overridden by the
 * joined argument string, e.g. `'msg output eDP-1 scale 2'`.
 */
export function fakeNiri(
  docs: { workspaces: unknown; outputs: unknown },
  overrides: Record<string, Partial<CommandResult>> = {},
): FakeNiri {
  const calls: string[] = [];
  const runner: CommandRunner = async (file, args) => {
    calls.push([file, ...args].join(' '));
    const key = args.join(' ');
    const base: CommandResult = { exitCode: 0, stdout: '', stderr: '', timedOut: false };

    if (key === 'msg --json workspaces') base.stdout = JSON.stringify(docs.workspaces);
    else if (key === 'msg --json outputs') base.stdout = JSON.stringify(docs.outputs);
    else if (!key.startsWith('msg output ')) {
      base.exitCode = 1;
      base.stderr = `unrecognized arguments: ${key}`;
    }

    return { ...base, ...overrides[key] };
  };
  return { runner, calls };
}
