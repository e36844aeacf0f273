import { execa } from 'execa';
import { existsSync, statSync, type Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { join, resolve } from 'path';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/errors.js';

const MAX_DEPTH = 3;

/**
 * Finds git working trees below `baseDir`, up to three levels deep. A
 * directory holding `.git` (a directory, or a file for linked worktrees) is
 * a repository and is not searched further. Hidden directories are skipped.
 *
 * @returns absolute repository paths, sorted
 */
export async function discoverRepos(baseDir: string): Promise<string[]> {
  const root = resolve(baseDir);

  if (!existsSync(root)) {
    throw new Error(`Directory does not exist: ${root}`);
  }
  if (!statSync(root).isDirectory()) {
    throw new Error(`Path is not a directory: ${root}`);
  }

  const repos = new Set<string>();
  const visited = new Set<string>();

  async function scanDir(dir: string, depth: number): Promise<void> {
    if (depth > MAX_DEPTH || visited.has(dir)) return;
    visited.add(dir);

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      ui.debug('init', `cannot read ${dir}: ${ErrorUtils.extractErrorMessage(error)}`);
      return;
    }

    if (entries.some(e => e.name === '.git')) {
      repos.add(dir);
      return;
    }

    await Promise.all(
      entries
        .filter(e => e.isDirectory() && !e.name.startsWith('.'))
        .map(e => scanDir(join(dir, e.name), depth + 1))
    );
  }

  await scanDir(root, 1);
  return Array.from(repos).sort();
}

/**
 * URL of the `origin` remote, or `undefined` when the repository has none.
 */
export async function originUrl(repoPath: string): Promise<string | undefined> {
  const { stdout, failed } = await execa('git', [
    '-C', resolve(repoPath),
    'config',
    '--get',
    'remote.origin.url'
  ], {
    shell: false,
    reject: false
  });
  const url = typeof stdout === 'string' ? stdout.trim() : '';
  return failed || !url ? undefined : url;
}
