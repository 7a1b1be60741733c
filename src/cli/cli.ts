import { ScalerError } from '../core/errors/scaler-error.js';
import { BadInput, ExternalFailure, NotFound } from '../core/errors/errors.js';
import { NiriClient, type CommandRunner } from '../core/niri-client.js';
import { handleCycle, type CycleOptions } from './commands/cycle.js';
import type { CliConfig } from './config.js';
import { renderDebug, renderError, renderOutcome } from './output.js';

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CliDeps {
  /** Replaces the execa runner, e.g. with an in-process fake. */
  runner?: CommandRunner;
  /** Receives --verbose trace lines as they happen. Without it they are collected into `stderr`. */
  onTrace?: (line: string) => void;
}

/**
 * Runs one already-parsed invocation and collects what it would print.
 * Exit status: 0 on success or no-op, 1 on any ScalerError.
 */
export class CLI {
  constructor(
    private readonly cfg: CliConfig,
    private readonly deps: CliDeps = {},
  ) {}

  async execute(opts: Omit<CycleOptions, 'dryRun'>): Promise<CliResult> {
    const stdout: string[] = [];
    const stderr: string[] = [];

    const onTrace = this.deps.onTrace ?? ((line: string) => stderr.push(line));
    const client = new NiriClient({
      binary: this.cfg.niriBinary,
      timeoutMs: this.cfg.timeoutMs,
      runner: this.deps.runner,
      trace: this.cfg.verbose ? (line) => onTrace(renderDebug(line)) : undefined,
    });

    try {
      const outcome = await handleCycle({ ...opts, dryRun: this.cfg.dryRun }, client);
      stdout.push(renderOutcome(outcome));
      return { exitCode: 0, stdout: joinLines(stdout), stderr: joinLines(stderr) };
    } catch (thrown) {
      const err = ScalerError.wrap(thrown);
      stderr.push(
        this.cfg.verbose
          ? err.prettyPrint({ color: this.cfg.useColor, includeStackTrace: !isExpectedFailure(err) })
          : renderError(err.message, this.cfg.useColor),
      );
      return { exitCode: 1, stdout: joinLines(stdout), stderr: joinLines(stderr) };
    }
  }
}

/** Failures a user can act on; anything else is a bug and gets a stack trace. */
function isExpectedFailure(err: unknown): boolean {
  return [NotFound, BadInput, ExternalFailure].some((facet) => ScalerError.has(err, facet));
}

function joinLines(lines: string[]): string {
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}
