/**
 * Install Command Handler
 *
 * mihomo-manager install [version|channel] [--default]
 *
 * Installs (default channel: stable) and makes the result the default
 * version when none is set yet or --default is given.
 */

import { info, ok } from '../utils/ui';
import { ProgressIndicator } from '../utils/progress-indicator';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags, extractFlag } from './arg-extractor';
import { InstallResult } from '../version/version-manager';

export interface InstallOutcome extends InstallResult {
  madeDefault: boolean;
}

/**
 * Install and report; shared by `install` and `version install`.
 */
export async function installVersion(
  ctx: CommandContext,
  target: string,
  options: { makeDefault?: boolean; signal?: AbortSignal } = {}
): Promise<InstallOutcome> {
  const release = await ctx.versions.resolve(target);
  const spinner = new ProgressIndicator(`Installing mihomo ${release.version}`);
  spinner.start();

  let result: InstallResult;
  try {
    result = await ctx.versions.install(release.version, {
      signal: options.signal,
      onProgress: (progress) => spinner.progress(progress),
    });
  } catch (error) {
    spinner.fail(`Install of ${release.version} failed`);
    throw error;
  }
  spinner.stop();

  const currentDefault = await ctx.versions.getDefault();
  const madeDefault = options.makeDefault === true || currentDefault === null;
  if (madeDefault) {
    await ctx.versions.setDefault(result.version.version);
  }
  return { ...result, madeDefault };
}

export async function handleInstallCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const defaultFlag = extractFlag(args, ['--default']);
  assertNoUnknownFlags(defaultFlag.remainingArgs, 'install');
  const target = defaultFlag.remainingArgs[0] ?? 'stable';

  const outcome = await installVersion(ctx, target, { makeDefault: defaultFlag.found, signal });
  printInstallOutcome(outcome);
}

export function printInstallOutcome(outcome: InstallOutcome): void {
  const id = outcome.version.version;
  if (outcome.downloaded) {
    console.log(ok(`Installed mihomo ${id}`));
  } else {
    console.log(info(`mihomo ${id} is already installed`));
  }
  if (outcome.madeDefault) {
    console.log(ok(`Default version set to ${id}`));
  }
}
