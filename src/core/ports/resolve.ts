/**
 * Port Resolution Helpers
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * Resolve the OutputPort from a ProvisionContext.
 * Falls back to consoleOutput (plain console.log) if not provided.
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
