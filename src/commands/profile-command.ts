/**
 * Profile Command Handlers
 *
 * mihomo-manager profile list|use|show|delete|import|validate
 *                        backup|backups|restore|delete-backup
 */

import * as path from 'path';
import { color, dim, header, info, ok, table } from '../utils/ui';
import { formatTimestamp } from '../utils/format';
import { ValidationError } from '../errors';
import { INBOUND_PORT_KEYS } from '../config/profile-schema';
import { CommandContext } from './command-context';
import {
  assertNoUnknownFlags,
  extractFlag,
  requireOptionValue,
  requirePositional,
} from './arg-extractor';

export const PROFILE_SUBCOMMANDS = [
  'list',
  'use',
  'show',
  'delete',
  'import',
  'validate',
  'backup',
  'backups',
  'restore',
  'delete-backup',
] as const;

/** A bare name refers to a stored profile; anything path-like is a file */
function looksLikePath(value: string): boolean {
  return value.includes('/') || value.includes(path.sep) || /\.ya?ml$/i.test(value);
}

export async function handleProfileCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const [sub = 'list', ...rest] = args;

  switch (sub) {
    case 'list':
      assertNoUnknownFlags(rest, 'profile list');
      return listProfiles(ctx);
    case 'use': {
      const name = requirePositional(rest, 0, 'name');
      await ctx.configs.setCurrent(name);
      console.log(ok(`Current profile set to ${name}`));
      const status = await ctx.service.status();
      if (
        status.state.status === 'running' &&
        status.configPath !== ctx.home.profilePath(name)
      ) {
        console.log(info('The running service keeps its profile until restart'));
      }
      return;
    }
    case 'show': {
      const { profile, content } = await ctx.configs.showProfile(rest[0]);
      console.log(dim(`# ${profile.path}`));
      process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
      return;
    }
    case 'delete': {
      const name = requirePositional(rest, 0, 'name');
      const wasCurrent = (await ctx.configs.getCurrent()) === name;
      await ctx.configs.deleteProfile(name);
      console.log(ok(`Deleted profile ${name}`));
      if (wasCurrent) {
        console.log(info('No current profile is set now (run: mihomo-manager profile use <name>)'));
      }
      return;
    }
    case 'import': {
      const force = extractFlag(rest, ['--force', '-f']);
      assertNoUnknownFlags(force.remainingArgs, 'profile import');
      const name = requirePositional(force.remainingArgs, 0, 'name');
      const file = requirePositional(force.remainingArgs, 1, 'file');
      const profile = await ctx.configs.importProfile(name, path.resolve(file), {
        force: force.found,
      });
      console.log(ok(`Imported ${file} as profile ${profile.name}`));
      return;
    }
    case 'validate': {
      const target = rest[0];
      const filePath =
        target === undefined
          ? await ctx.configs.getCurrentPath()
          : looksLikePath(target)
            ? path.resolve(target)
            : ctx.home.profilePath(target);
      const doc = await ctx.configs.validate(filePath);
      const ports = INBOUND_PORT_KEYS.filter((key) => doc[key] !== undefined).map(
        (key) => `${key} ${doc[key]}`
      );
      console.log(ok(`${filePath} is valid`));
      console.log(`    ${dim(`inbound: ${ports.join(', ')}`)}`);
      return;
    }
    case 'backup': {
      const description = requireOptionValue(rest, ['--description', '-m']);
      assertNoUnknownFlags(description.remainingArgs, 'profile backup');
      const backup = await ctx.configs.backupProfile(description.remainingArgs[0], description.value);
      console.log(ok(`Backed up ${backup.profile} as ${backup.id}`));
      return;
    }
    case 'backups':
      assertNoUnknownFlags(rest, 'profile backups');
      return listBackups(ctx, rest[0]);
    case 'restore': {
      const into = requireOptionValue(rest, ['--into']);
      const noBackup = extractFlag(into.remainingArgs, ['--no-backup']);
      assertNoUnknownFlags(noBackup.remainingArgs, 'profile restore');
      const id = requirePositional(noBackup.remainingArgs, 0, 'backup');
      const result = await ctx.configs.restoreBackup(id, {
        profile: into.value,
        backupCurrent: !noBackup.found,
      });
      if (result.safetyBackup) {
        console.log(info(`Previous content saved as ${result.safetyBackup.id}`));
      }
      console.log(ok(`Restored ${id} into profile ${result.profile}`));
      return;
    }
    case 'delete-backup': {
      const id = requirePositional(rest, 0, 'backup');
      await ctx.configs.deleteBackup(id);
      console.log(ok(`Deleted backup ${id}`));
      return;
    }
    default:
      throw new ValidationError(`Unknown profile subcommand: ${sub}`, { key: sub });
  }
}

async function listProfiles(ctx: CommandContext): Promise<void> {
  const profiles = await ctx.configs.listProfiles();
  if (profiles.length === 0) {
    console.log(info('No profiles yet (one is created on first start)'));
    return;
  }
  const rows = profiles.map((p) => [
    p.isCurrent ? color('*', 'success') : '',
    p.name,
    formatTimestamp(p.createdAt),
  ]);
  console.log(header('Profiles'));
  console.log(table(rows, { head: ['', 'Name', 'Created'] }));
}

async function listBackups(ctx: CommandContext, profile?: string): Promise<void> {
  const backups = await ctx.configs.listBackups(profile);
  if (backups.length === 0) {
    console.log(info(profile ? `No backups of ${profile}` : 'No backups yet'));
    return;
  }
  const rows = backups.map((b) => [
    b.id,
    b.profile,
    formatTimestamp(b.createdAt),
    b.description ?? dim('-'),
  ]);
  console.log(header('Backups'));
  console.log(table(rows, { head: ['Id', 'Profile', 'Created', 'Description'] }));
}
