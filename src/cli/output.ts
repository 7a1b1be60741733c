import type { CycleOutcome } from './commands/cycle.js';

export function formatScale(scale: number): string {
  return String(scale);
}

export function renderOutcome(outcome: CycleOutcome): string {
  const from = formatScale(outcome.from);
  switch (outcome.kind) {
    case 'applied':
      return renderSuccess(`Scaled ${outcome.output} from ${from} to ${formatScale(outcome.to)}`);
    case 'dry-run':
      return renderProgress(`Would scale ${outcome.output} from ${from} to ${formatScale(outcome.to)}`);
    case 'no-op':
      return renderNotice(`No target scales given, ${outcome.output} stays at ${from}`);
  }
}

export function renderSuccess(message: string): string {
  return `✓ ${message}`;
}

export function renderError(message: string, useColor = false): string {
  return useColor ? `\x1b[31mError:\x1b[0m ${message}` : `Error: ${message}`;
}

export function renderProgress(message: string): string {
  return `→ ${message}`;
}

export function renderNotice(message: string): string {
  return `(${message})`;
}

export function renderDebug(message: string): string {
  return `· ${message}`;
}
