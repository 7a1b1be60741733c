import { object } from '@optique/core/constructs';
import { multiple, withDefault } from '@optique/core/modifiers';
import { option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { NiriState, CURRENT_OUTPUT, currentScaleOf } from '../../core/niri-state.js';
import { selectNextScale, sortScales, type Direction } from '../../core/scale-selector.js';
import type { NiriClient } from '../../core/niri-client.js';
import { directionArg, niriOption, outputArg, scaleArg, timeoutOption, verboseOption } from '../parsers.js';

export const cycleCommand = object({
  scales: multiple(
    option('-s', '--scale', scaleArg, { description: message`Target output scale. Can be given multiple times` }),
  ),
  output: withDefault(
    option('-o', '--output', outputArg, {
      description: message`The target output. ${CURRENT_OUTPUT} scales the output holding the focused workspace`,
    }),
    CURRENT_OUTPUT,
  ),
  direction: withDefault(
    option('--direction', directionArg, { description: message`Which way to cycle through the scales` }),
    'forwards' as const,
  ),
  dryRun: option('--dry-run', { description: message`Print the next scale without applying it` }),
  niri: niriOption,
  timeout: timeoutOption,
  verbose: verboseOption,
});

export interface CycleOptions {
  scales: readonly number[];
  output: string;
  direction: Direction;
  dryRun: boolean;
}

export type CycleOutcome =
  | { kind: 'applied'; output: string; from: number; to: number }
  | { kind: 'dry-run'; output: string; from: number; to: number }
  | { kind: 'no-op'; output: string; from: number };

/**
 * Move the target output to the next configured scale.
 * Resolution and compositor failures are thrown as ScalerErrors.
 */
export async function handleCycle(opts: CycleOptions, client: NiriClient): Promise<CycleOutcome> {
  const targets = sortScales(opts.scales);

  const state = await NiriState.load(client);
  const output = state.resolveOutput(opts.output);
  const from = currentScaleOf(output);

  const to = selectNextScale(from, targets, opts.direction);
  if (to === null) {
    return { kind: 'no-op', output: output.name, from };
  }

  if (opts.dryRun) {
    return { kind: 'dry-run', output: output.name, from, to };
  }

  await client.applyScale(output.name, to);
  return { kind: 'applied', output: output.name, from, to };
}
