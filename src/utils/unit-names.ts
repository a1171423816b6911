/**
 * Normalize unit names given on the command line or in configuration.
 *
 * Accepts both separate arguments and comma-separated lists
 * (`labsetup install afni,fsl docker`). Names are trimmed and lowercased;
 * duplicates collapse to their first occurrence so the requested set keeps
 * the caller's order.
 */
export function normalizeRequestedUnits(inputs: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const input of inputs) {
    for (const part of input.split(',')) {
      const name = part.trim().toLowerCase();
      if (name && !seen.has(name)) {
        seen.add(name);
        result.push(name);
      }
    }
  }

  return result;
}
