#!/usr/bin/env node

import { runCli } from './cli.js';
import { ExitCode } from './errors.js';
import { ui } from './ui.js';
import { EnvironmentUtils } from './utils/environment.js';
import { ErrorUtils } from './utils/errors.js';

async function main(): Promise<number> {
  // The first Ctrl+C cancels the running scripts; grove then exits with 130.
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    return await runCli(process.argv.slice(2), {
      cwd: process.cwd(),
      env: process.env,
      signal: controller.signal
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

// Export for testing
export { main };

if (!EnvironmentUtils.isTestEnvironment()) {
  main().then(
    code => { process.exitCode = code; },
    (error: unknown) => {
      ui.error(`❌ Unexpected error: ${ErrorUtils.extractErrorMessage(error)}`);
      process.exitCode = ExitCode.SOFTWARE;
    }
  );
}
