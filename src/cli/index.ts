#!/usr/bin/env node
import { message } from '@optique/core/message';
import { run } from '@optique/run';
import { cycleCommand } from './commands/cycle.js';
import { CLI } from './cli.js';
import { CliConfig } from './config.js';

const result = run(cycleCommand, {
  programName: 'niri-output-scaler',
  version: '0.1.0',
  description: message`Cycle a niri output through a list of scales`,
  help: 'option',
});

const cfg = CliConfig.build({
  niriBinary: result.niri,
  timeoutMs: result.timeout,
  verbose: result.verbose,
  dryRun: result.dryRun,
});

void (async () => {
  try {
    const cli = new CLI(cfg, { onTrace: (line) => process.stderr.write(line + '\n') });
    const res = await cli.execute({
      scales: result.scales,
      output: result.output,
      direction: result.direction,
    });
    process.stdout.write(res.stdout);
    process.stderr.write(res.stderr);
    process.exitCode = res.exitCode;
  } catch (err) {
    console.error(err instanceof Error ? err : 'Command failed');
    process.exit(1);
  }
})();
