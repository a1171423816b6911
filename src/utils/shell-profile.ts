/**
 * Managed blocks inside shell profile files (~/.bashrc and friends).
 *
 * A block looks like:
 *
 *   # >>> labsetup:aliases >>>
 *   alias ll='ls -alF'
 *   # <<< labsetup:aliases <<<
 *
 * Writing a block that already exists replaces it in place, so re-running a
 * unit never duplicates lines.
 */

import { PROFILE_MARKERS } from '../constants/index.js';
import { exists, readTextFile, writeTextFile } from './fs.js';

export type ProfileBlockChange = 'added' | 'updated' | 'unchanged';

function beginMarker(id: string): string {
  return `${PROFILE_MARKERS.BEGIN}${id}${PROFILE_MARKERS.SUFFIX_BEGIN}`;
}

function endMarker(id: string): string {
  return `${PROFILE_MARKERS.END}${id}${PROFILE_MARKERS.SUFFIX_END}`;
}

export function renderProfileBlock(id: string, body: readonly string[]): string {
  return [beginMarker(id), ...body, endMarker(id)].join('\n');
}

interface BlockRange {
  start: number;
  end: number;
}

function findBlock(lines: readonly string[], id: string): BlockRange | null {
  const start = lines.indexOf(beginMarker(id));
  if (start === -1) {
    return null;
  }
  const end = lines.indexOf(endMarker(id), start + 1);
  return end === -1 ? null : { start, end };
}

/**
 * Return the profile text with the block inserted or replaced
 */
export function upsertBlockInText(content: string, id: string, body: readonly string[]): { content: string; change: ProfileBlockChange } {
  const lines = content === '' ? [] : content.replace(/\n$/, '').split('\n');
  const blockLines = renderProfileBlock(id, body).split('\n');
  const range = findBlock(lines, id);

  if (range) {
    const current = lines.slice(range.start, range.end + 1);
    if (current.join('\n') === blockLines.join('\n')) {
      return { content, change: 'unchanged' };
    }
    const next = [...lines.slice(0, range.start), ...blockLines, ...lines.slice(range.end + 1)];
    return { content: next.join('\n') + '\n', change: 'updated' };
  }

  const separator = lines.length > 0 ? [''] : [];
  return { content: [...lines, ...separator, ...blockLines].join('\n') + '\n', change: 'added' };
}

export async function upsertProfileBlock(profilePath: string, id: string, body: readonly string[]): Promise<ProfileBlockChange> {
  const content = (await exists(profilePath)) ? await readTextFile(profilePath) : '';
  const result = upsertBlockInText(content, id, body);
  if (result.change !== 'unchanged') {
    await writeTextFile(profilePath, result.content);
  }
  return result.change;
}

export async function hasProfileBlock(profilePath: string, id: string): Promise<boolean> {
  if (!(await exists(profilePath))) {
    return false;
  }
  const content = await readTextFile(profilePath);
  return findBlock(content.split('\n'), id) !== null;
}
