import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../../../src/core/home-context';
import { NotFoundError, ValidationError } from '../../../src/errors';
import { BackupStore, backupStamp, isValidBackupId } from '../../../src/config/backup-store';
import { makeTempHome, removeTempHome } from '../../helpers/fixtures';

const PROFILE = 'mixed-port: 7890\nmode: rule\n';
const AT = new Date(Date.UTC(2026, 9, 18, 9, 30, 5));

describe('BackupStore', () => {
  let home: HomeContext;
  let backups: BackupStore;

  beforeEach(() => {
    home = makeTempHome();
    backups = new BackupStore(home);
  });

  afterEach(() => {
    removeTempHome(home);
  });

  it('formats the stamp in UTC', () => {
    expect(backupStamp(AT)).toBe('20261018-093005');
    expect(backupStamp(new Date(Date.UTC(2027, 0, 2, 3, 4, 5)))).toBe('20270102-030405');
  });

  it('stores the content behind a metadata line', async () => {
    const backup = await backups.create('work', PROFILE, { description: ' before edit ', now: AT });

    expect(backup).toEqual({
      id: 'work-20261018-093005',
      profile: 'work',
      createdAt: AT.getTime(),
      description: 'before edit',
      path: path.join(home.backupsDir, 'work-20261018-093005.yaml'),
    });
    expect(fs.readFileSync(backup.path, 'utf8')).toBe(
      '# mihomo-manager backup {"profile":"work","createdAt":"2026-10-18T09:30:05.000Z","description":"before edit"}\n' +
        PROFILE
    );
    await expect(backups.read(backup.id)).resolves.toEqual({ backup, content: PROFILE });
  });

  it('keeps content without a trailing newline as is', async () => {
    const backup = await backups.create('work', 'mode: rule', { now: AT });

    await expect(backups.read(backup.id)).resolves.toMatchObject({
      backup: { description: null },
      content: 'mode: rule',
    });
  });

  it('numbers backups taken within the same second', async () => {
    const first = await backups.create('work', PROFILE, { now: AT });
    const second = await backups.create('work', PROFILE, { now: AT });
    const third = await backups.create('work', PROFILE, { now: AT });

    expect([first.id, second.id, third.id]).toEqual([
      'work-20261018-093005',
      'work-20261018-093005-2',
      'work-20261018-093005-3',
    ]);
  });

  it('lists newest first, optionally for one profile', async () => {
    await backups.create('work', PROFILE, { now: new Date(Date.UTC(2026, 0, 1)) });
    await backups.create('home', PROFILE, { now: new Date(Date.UTC(2026, 5, 1)) });
    await backups.create('work', PROFILE, { now: new Date(Date.UTC(2026, 2, 1)) });

    expect((await backups.list()).map((b) => b.id)).toEqual([
      'home-20260601-000000',
      'work-20260301-000000',
      'work-20260101-000000',
    ]);
    expect((await backups.list('work')).map((b) => b.id)).toEqual([
      'work-20260301-000000',
      'work-20260101-000000',
    ]);
  });

  it('skips files without a backup header', async () => {
    await backups.create('work', PROFILE, { now: AT });
    fs.writeFileSync(path.join(home.backupsDir, 'notes.yaml'), 'mode: rule\n');
    fs.writeFileSync(path.join(home.backupsDir, 'broken.yaml'), '# mihomo-manager backup {oops\n');

    expect((await backups.list()).map((b) => b.id)).toEqual(['work-20261018-093005']);
    await expect(backups.read('notes')).rejects.toThrow(
      new ValidationError('Backup notes has no metadata header')
    );
  });

  it('lists nothing before the first backup', async () => {
    await expect(backups.list()).resolves.toEqual([]);
  });

  it('removes a backup', async () => {
    const backup = await backups.create('work', PROFILE, { now: AT });

    await backups.remove(backup.id);

    expect(fs.existsSync(backup.path)).toBe(false);
    await expect(backups.remove(backup.id)).rejects.toThrow(
      new NotFoundError('Backup work-20261018-093005 does not exist')
    );
  });

  it('refuses ids that leave the backups directory', async () => {
    expect(isValidBackupId('work-20261018-093005')).toBe(true);
    expect(isValidBackupId('../work')).toBe(false);
    expect(isValidBackupId('work.yaml')).toBe(false);

    await expect(backups.read('../work')).rejects.toThrow(
      new ValidationError('Invalid backup id: "../work"')
    );
    await expect(backups.read('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });
});
