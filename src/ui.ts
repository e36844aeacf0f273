import pc from 'picocolors';

let verbosity = 0;
let quiet = false;

/**
 * Centralized UI messaging utilities for consistent CLI experience.
 *
 * Tree headers, debug output and errors go to stderr so that the output of
 * the commands grove runs, and of `grove eval`, stays clean on stdout.
 */
export const ui = {
  setVerbosity: (level: number) => { verbosity = level; },
  setQuiet: (value: boolean) => { quiet = value; },

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.error(pc.red(message)),
  warning: (message: string) => console.error(pc.yellow(message)),

  // Special formatting
  dim: (text: string) => pc.gray(text),

  debug: (topic: string, message: string) => {
    if (verbosity > 0) {
      console.error(pc.gray(`debug: ${topic}: ${message}`));
    }
  },

  // Trees
  tree: (name: string, path: string) => {
    if (quiet) return;
    console.error(verbosity > 0
      ? `${pc.cyan('#')} ${pc.bold(pc.blue(name))}  ${pc.blue(path)}`
      : `${pc.cyan('#')} ${pc.bold(pc.blue(name))}`);
  },

  missingTree: (name: string, path: string) => {
    if (quiet) return;
    const detail = verbosity > 0 ? `  ${path}` : '';
    console.error(pc.bold(pc.gray(`# ${name}${detail} (skipped)`)));
  },

  command: (script: string) => {
    if (verbosity > 1) {
      console.error(`${pc.cyan(':')} ${pc.green(script)}`);
    }
  },

  treeListItem: (name: string, path: string, exists: boolean) =>
    console.log(exists ? `${pc.bold(name)}  ${path}` : `${pc.bold(name)}  ${pc.gray(`${path} (missing)`)}`),

  // Interactive setup
  searching: (directory: string) =>
    console.log(pc.gray(`Searching for git repositories in: ${directory}\n`)),

  foundRepos: (count: number) =>
    console.log(pc.green(`✅ Found ${count} git repository(ies)\n`)),

  configSummary: () => console.log(pc.cyan('📋 Configuration Summary:')),

  summaryItem: (index: number, name: string, path: string) =>
    console.log(`${index + 1}. ${pc.bold(name)} ${pc.gray(path)}`),

  noReposFound: (directory: string) => {
    ui.error(`❌ No git repositories found in ${directory}`);
    ui.warning('💡 Make sure the directory contains git repositories or try a different path.');
  },

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  }
} as const;
