/**
 * CLI Context Factory
 *
 * Creates ProvisionContext instances with the CLI's output port injected
 * (Clack in a terminal, plain console output otherwise). Command handlers
 * use this instead of calling createProvisionContext() directly.
 */

import type { ProvisionContext, ProvisionContextOptions } from '../types/execution-context.js';
import { createProvisionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export async function createCliProvisionContext(options: ProvisionContextOptions = {}): Promise<ProvisionContext> {
  const output = getCliOutput(detectInteractive(options.interactive));
  return createProvisionContext(options, output);
}
