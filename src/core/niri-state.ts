import { ErrNoFocusedOutput, ErrOutputDisabled, ErrUnknownOutput } from './errors/errors.js';
import type { NiriClient } from './niri-client.js';
import type { NiriOutput, NiriOutputs, NiriWorkspace } from '../types/niri.js';

/** Output target meaning "whichever output holds the focused workspace". */
export const CURRENT_OUTPUT = '@current';

/**
 * Snapshot of compositor state for a single run.
 * Never refreshed; every view below is computed from the two documents.
 */
export class NiriState {
  private readonly outputsByName: ReadonlyMap<string, NiriOutput>;

  private constructor(
    readonly workspaces: readonly NiriWorkspace[],
    outputs: NiriOutputs,
  ) {
    this.outputsByName = new Map(Object.entries(outputs));
  }

  static from(workspaces: readonly NiriWorkspace[], outputs: NiriOutputs): NiriState {
    return new NiriState(workspaces, outputs);
  }

  static async load(client: NiriClient): Promise<NiriState> {
    const workspaces = await client.workspaces();
    const outputs = await client.outputs();
    return new NiriState(workspaces, outputs);
  }

  get outputNames(): string[] {
    return [...this.outputsByName.keys()];
  }

  get focusedWorkspace(): NiriWorkspace | undefined {
    return this.workspaces.find((w) => w.is_focused);
  }

  get activeWorkspaces(): NiriWorkspace[] {
    return this.workspaces.filter((w) => w.is_active);
  }

  get focusedOutput(): NiriOutput | undefined {
    const outputName = this.focusedWorkspace?.output;
    return outputName ? this.outputsByName.get(outputName) : undefined;
  }

  /**
   * Resolve an output name, or CURRENT_OUTPUT, to exactly one output.
   * Throws resolve.no_focused_output or resolve.unknown_output.
   */
  resolveOutput(target: string): NiriOutput {
    if (target === CURRENT_OUTPUT) {
      const focused = this.focusedOutput;
      if (!focused) {
        throw ErrNoFocusedOutput.create({});
      }
      return focused;
    }

    const output = this.outputsByName.get(target);
    if (!output) {
      throw ErrUnknownOutput.create({ output: target, known: this.outputNames });
    }
    return output;
  }
}

/** Current logical scale of an output. Disabled outputs have none. */
export function currentScaleOf(output: NiriOutput): number {
  if (!output.logical) {
    throw ErrOutputDisabled.create({ output: output.name });
  }
  return output.logical.scale;
}
