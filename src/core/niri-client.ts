import { execa, ExecaError } from 'execa';
import type { z } from 'zod';
import { ErrExternalToolFailure, ErrInvalidResponse } from './errors/errors.js';
import {
  NiriOutputsSchema,
  NiriWorkspacesSchema,
  type NiriMessage,
  type NiriOutputs,
  type NiriWorkspace,
} from '../types/niri.js';

export const DEFAULT_NIRI_BINARY = 'niri';
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface CommandResult {
  /** Undefined when the process never exited on its own (spawn failure, timeout, signal). */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Why the process could not be started, e.g. `spawn niri ENOENT`. */
  error?: string;
}

/** Runs a binary to completion. Must not throw on a non-zero exit. */
export type CommandRunner = (file: string, args: readonly string[], opts: { timeoutMs: number }) => Promise<CommandResult>;

export const execaRunner: CommandRunner = async (file, args, { timeoutMs }) => {
  const child = await execa(file, args, { reject: false, timeout: timeoutMs, stdin: 'ignore' });
  const result: CommandResult = {
    exitCode: child.exitCode,
    stdout: child.stdout,
    stderr: child.stderr,
    timedOut: child.timedOut,
  };
  if (child instanceof ExecaError && child.exitCode === undefined && !child.timedOut) {
    result.error = child.originalMessage || child.shortMessage;
  }
  return result;
};

export interface NiriClientOptions {
  binary?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  /** Receives one line per external command, before and after it runs. */
  trace?: (line: string) => void;
}

/**
 * Talks to the compositor through its `msg` subcommand.
 *
 * Compositor state does not change under us within one run, so each read
 * message is spawned at most once per client; concurrent callers share the
 * pending result.
 */
export class NiriClient {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly trace?: (line: string) => void;
  private readonly queries = new Map<NiriMessage, Promise<unknown>>();

  constructor(options: NiriClientOptions = {}) {
    this.binary = options.binary ?? DEFAULT_NIRI_BINARY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? execaRunner;
    this.trace = options.trace;
  }

  /** Raw JSON answer to `niri msg --json <message>`. */
  query(message: NiriMessage): Promise<unknown> {
    let pending = this.queries.get(message);
    if (!pending) {
      pending = this.fetchJson(message);
      this.queries.set(message, pending);
    }
    return pending;
  }

  async workspaces(): Promise<NiriWorkspace[]> {
    return parseResponse('workspaces', NiriWorkspacesSchema, await this.query('workspaces'));
  }

  async outputs(): Promise<NiriOutputs> {
    return parseResponse('outputs', NiriOutputsSchema, await this.query('outputs'));
  }

  /** Set the logical scale of an output. Never cached. */
  async applyScale(outputName: string, scale: number): Promise<void> {
    await this.exec(['msg', 'output', outputName, 'scale', String(scale)]);
  }

  private async fetchJson(message: NiriMessage): Promise<unknown> {
    const stdout = await this.exec(['msg', '--json', message]);
    if (stdout.trim() === '') {
      throw ErrExternalToolFailure.create({
        command: this.describe(['msg', '--json', message]),
        exitCode: 0,
        stderr: '',
        reason: 'produced no output',
      });
    }
    try {
      return JSON.parse(stdout);
    } catch (err) {
      throw ErrInvalidResponse.create({
        message,
        issues: [err instanceof Error ? err.message : String(err)],
      });
    }
  }

  private async exec(args: string[]): Promise<string> {
    const command = this.describe(args);
    this.trace?.(`running ${command}`);

    const result = await this.runner(this.binary, args, { timeoutMs: this.timeoutMs });
    this.trace?.(`${command} exited with ${result.timedOut ? 'timeout' : String(result.exitCode ?? 'no status')}`);

    if (result.timedOut) {
      throw ErrExternalToolFailure.create({
        command,
        exitCode: null,
        stderr: result.stderr,
        reason: `timed out after ${this.timeoutMs}ms`,
      });
    }
    if (result.exitCode !== 0) {
      throw ErrExternalToolFailure.create({
        command,
        exitCode: result.exitCode ?? null,
        stderr: result.stderr,
        reason:
          result.exitCode === undefined
            ? result.error
              ? `could not be run: ${result.error}`
              : 'could not be run'
            : `returned non-zero status ${result.exitCode}`,
      });
    }
    return result.stdout;
  }

  private describe(args: readonly string[]): string {
    return [this.binary, ...args].join(' ');
  }
}

function parseResponse<T>(message: NiriMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw ErrInvalidResponse.create({
      message,
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    });
  }
  return parsed.data;
}
