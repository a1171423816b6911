/**
 * Download and unpack installer archives with curl and tar/unzip
 */

import { basename, join } from 'path';
import { runChecked, type CommandRunner } from './command-runner.js';

export interface DownloadOptions {
  /** File name inside the download directory (default: last URL segment) */
  fileName?: string;
}

/**
 * Fetch `url` into `downloadDir` and return the local path
 */
export async function downloadFile(
  runner: CommandRunner,
  url: string,
  downloadDir: string,
  options: DownloadOptions = {}
): Promise<string> {
  const fileName = options.fileName ?? basename(new URL(url).pathname);
  const destination = join(downloadDir, fileName);

  await runChecked(runner, 'mkdir', ['-p', downloadDir]);
  await runChecked(runner, 'curl', ['-fsSL', '--retry', '3', '-o', destination, url]);
  return destination;
}

/**
 * Unpack a .tar.* or .zip archive into `targetDir`
 */
export async function extractArchive(
  runner: CommandRunner,
  archive: string,
  targetDir: string,
  options: { sudo?: boolean } = {}
): Promise<void> {
  await runChecked(runner, 'mkdir', ['-p', targetDir], { sudo: options.sudo });
  if (archive.endsWith('.zip')) {
    await runChecked(runner, 'unzip', ['-q', '-o', archive, '-d', targetDir], { sudo: options.sudo });
  } else {
    await runChecked(runner, 'tar', ['-xf', archive, '-C', targetDir], { sudo: options.sudo });
  }
}
