import { checkbox, confirm, input } from '@inquirer/prompts';
import { basename } from 'path';
import { UserCancelledError } from './errors.js';
import { discoverRepos, originUrl } from './git.js';
import { ui } from './ui.js';

/** A repository the user chose to manage as a tree. */
export type TreePick = {
  /** Tree name, unique within the configuration */
  name: string;
  /** Absolute path of the repository */
  path: string;
  /** `origin` remote, when the repository has one */
  url?: string;
};

export type InitSelections = {
  baseDir: string;
  trees: TreePick[];
  /** Group holding every picked tree; empty for none */
  group: string;
};

const NAME_PATTERN = /^[a-zA-Z0-9._-]+$/;

/**
 * Interactive flow behind `grove init`:
 * 1. Prompts for the directory to search
 * 2. Discovers the git repositories below it
 * 3. Lets the user pick which ones become trees
 * 4. Asks for a name per tree and an optional group for all of them
 * 5. Shows a summary and asks for confirmation
 *
 * @throws {UserCancelledError} When the user cancels via Ctrl+C or declines the summary
 * @throws {Error} When no git repositories are found
 */
export async function getInitSelections(defaultDir: string): Promise<InitSelections> {
  try {
    const baseDir = await input({
      message: 'Directory to search for repositories:',
      default: defaultDir,
      validate: (value: string) => (value.trim() ? true : 'Directory cannot be empty')
    });

    ui.searching(baseDir);
    const repos = await discoverRepos(baseDir.trim());
    if (repos.length === 0) {
      ui.noReposFound(baseDir);
      throw new Error(`No git repositories found in ${baseDir}`);
    }
    ui.foundRepos(repos.length);

    const selected = await checkbox({
      message: 'Select repositories to manage:',
      choices: repos.map(repo => ({
        name: `${basename(repo)} ${ui.dim(`(${repo})`)}`,
        value: repo,
        checked: true
      })),
      required: true
    });

    const trees: TreePick[] = [];
    for (const repo of selected) {
      const name = await input({
        message: `Tree name for ${repo}:`,
        default: basename(repo),
        validate: (value: string) => {
          const trimmed = value.trim();
          if (!NAME_PATTERN.test(trimmed)) {
            return 'Names can only contain letters, numbers, dots, hyphens, and underscores';
          }
          if (trees.some(tree => tree.name === trimmed)) {
            return 'This name is already in use, please choose a different one';
          }
          return true;
        }
      });
      trees.push({ name: name.trim(), path: repo, url: await originUrl(repo) });
    }

    const group = await input({
      message: 'Group name for these trees (leave empty for none):',
      default: '',
      validate: (value: string) => {
        const trimmed = value.trim();
        if (!trimmed) return true;
        if (!NAME_PATTERN.test(trimmed)) {
          return 'Names can only contain letters, numbers, dots, hyphens, and underscores';
        }
        if (trees.some(tree => tree.name === trimmed)) {
          return 'A group cannot share its name with a tree';
        }
        return true;
      }
    });

    ui.configSummary();
    trees.forEach((tree, index) => ui.summaryItem(index, tree.name, tree.path));

    const confirmed = await confirm({ message: 'Write this configuration?', default: true });
    if (!confirmed) {
      throw new UserCancelledError('Configuration cancelled by user');
    }

    return { baseDir: baseDir.trim(), trees, group: group.trim() };
  } catch (error) {
    if (error instanceof Error && (error.name === 'ExitPromptError' || error.message.includes('User force closed'))) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}
