#!/usr/bin/env node
/**
 * mihomo-manager CLI entry point
 */

import { HomeContext } from './core/home-context';
import { handleError } from './errors';
import { setVerbose } from './utils/logger';
import { extractGlobalOptions, hasAnyFlag } from './commands/arg-extractor';
import { createCommandContext } from './commands/command-context';
import { dispatchCommand } from './commands/dispatcher';
import { handleHelpCommand } from './commands/help-command';
import { printManagerVersion } from './commands/version-command';

export async function main(argv: string[], signal?: AbortSignal): Promise<void> {
  const globals = extractGlobalOptions(argv);
  if (globals.verbose) setVerbose(true);
  const args = globals.args;
  const home = HomeContext.resolve({ home: globals.home });

  if (args[0] === '--version' || args[0] === '-v') {
    printManagerVersion();
    return;
  }
  if (args.length === 0 || args[0] === 'help' || hasAnyFlag(args.slice(0, 1), ['--help', '-h'])) {
    handleHelpCommand(home);
    return;
  }

  const ctx = createCommandContext(home);
  await dispatchCommand(ctx, args, signal);
}

if (require.main === module) {
  const controller = new AbortController();
  // First Ctrl-C ends streams and the monitor; a second one exits at once
  process.on('SIGINT', () => {
    if (controller.signal.aborted) process.exit(130);
    controller.abort();
  });
  process.on('SIGTERM', () => controller.abort());

  main(process.argv.slice(2), controller.signal).catch(handleError);
}
