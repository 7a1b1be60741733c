import { option } from '@optique/core/primitives';
import { withDefault } from '@optique/core/modifiers';
import { choice, integer, string } from '@optique/core/valueparser';
import type { ValueParser, ValueParserResult } from '@optique/core/valueparser';
import type { Suggestion } from '@optique/core/parser';
import { message } from '@optique/core/message';
import { DIRECTIONS } from '../core/scale-selector.js';
import { CURRENT_OUTPUT } from '../core/niri-state.js';
import { DEFAULT_NIRI_BINARY, DEFAULT_TIMEOUT_MS } from '../core/niri-client.js';

// Plain decimals only: Number() would also take hex, binary and exponent forms
const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;

// Positive, finite scale factor
export const scaleArg: ValueParser<'sync', number> = {
  $mode: 'sync',
  metavar: 'SCALE',
  parse(input: string): ValueParserResult<number> {
    const trimmed = input.trim();
    const value = Number(trimmed);
    if (!DECIMAL.test(trimmed) || !Number.isFinite(value)) {
      return { success: false, error: message`Scale must be a number, got ${input}` };
    }
    if (value <= 0) {
      return { success: false, error: message`Scale must be greater than zero, got ${input}` };
    }
    return { success: true, value };
  },
  format(value: number): string {
    return String(value);
  },
};

// Output name; resolved against the compositor later
export const outputArg: ValueParser<'sync', string> = {
  $mode: 'sync',
  metavar: 'OUTPUT',
  parse(input: string): ValueParserResult<string> {
    if (!input) {
      return { success: false, error: message`Output name cannot be empty` };
    }
    return { success: true, value: input };
  },
  format(value: string): string {
    return value;
  },
  *suggest(): Generator<Suggestion> {
    yield { kind: 'literal', text: CURRENT_OUTPUT, description: message`The output holding the focused workspace` };
  },
};

export const directionArg = choice(DIRECTIONS);

// Options shared by anything that talks to the compositor
export const niriOption = withDefault(
  option('--niri', string({ metavar: 'PATH' }), { description: message`Compositor binary to run` }),
  DEFAULT_NIRI_BINARY,
);

export const timeoutOption = withDefault(
  option('--timeout', integer({ min: 1, metavar: 'MS' }), {
    description: message`Give up on a compositor command after this many milliseconds`,
  }),
  DEFAULT_TIMEOUT_MS,
);

export const verboseOption = option('-v', '--verbose', { description: message`Trace compositor commands on stderr` });
