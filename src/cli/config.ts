import { DEFAULT_NIRI_BINARY, DEFAULT_TIMEOUT_MS } from '../core/niri-client.js';

/** Everything the CLI needs to know besides the command's own options. */
export interface CliConfig {
  readonly niriBinary: string;
  readonly timeoutMs: number;
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly useColor: boolean;
}

export const CliConfig = {
  build(overrides: Partial<CliConfig> = {}): CliConfig {
    return {
      niriBinary: overrides.niriBinary ?? DEFAULT_NIRI_BINARY,
      timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      verbose: overrides.verbose ?? false,
      dryRun: overrides.dryRun ?? false,
      useColor: overrides.useColor ?? Boolean(process.stderr.isTTY),
    };
  },
};
