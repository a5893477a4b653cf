import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { discoverSqlFiles } from '../files.js';

let root: string;

beforeEach(async () => {
  root = await realpath(await mkdtemp(join(tmpdir(), 'discovery-test-')));
  await mkdir(join(root, 'models', 'staging'), { recursive: true });
  await mkdir(join(root, 'node_modules', 'pkg'), { recursive: true });
  await mkdir(join(root, '.hidden'), { recursive: true });
  await mkdir(join(root, '.reflowlint', 'backups'), { recursive: true });

  await writeFile(join(root, 'top.sql'), 'SELECT 1;', 'utf-8');
  await writeFile(join(root, 'README.md'), '# notes', 'utf-8');
  await writeFile(join(root, 'models', 'orders.SQL'), 'SELECT 1;', 'utf-8');
  await writeFile(join(root, 'models', 'staging', 'customers.sql'), 'SELECT 1;', 'utf-8');
  await writeFile(join(root, 'node_modules', 'pkg', 'ignored.sql'), 'SELECT 1;', 'utf-8');
  await writeFile(join(root, '.hidden', 'ignored.sql'), 'SELECT 1;', 'utf-8');
  await writeFile(join(root, '.reflowlint', 'backups', 'ignored.sql'), 'SELECT 1;', 'utf-8');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('discoverSqlFiles', () => {
  it('walks directories for .sql files, skipping ignored and hidden ones', async () => {
    const { files, missing } = await discoverSqlFiles(['.'], root);
    expect(files).toEqual([
      join(root, 'models', 'orders.SQL'),
      join(root, 'models', 'staging', 'customers.sql'),
      join(root, 'top.sql'),
    ]);
    expect(missing).toEqual([]);
  });

  it('takes explicitly named files whatever their extension', async () => {
    const { files } = await discoverSqlFiles(['README.md'], root);
    expect(files).toEqual([join(root, 'README.md')]);
  });

  it('de-duplicates overlapping paths', async () => {
    const { files } = await discoverSqlFiles(['models', 'models/staging/customers.sql'], root);
    expect(files).toEqual([join(root, 'models', 'orders.SQL'), join(root, 'models', 'staging', 'customers.sql')]);
  });

  it('lists paths that do not exist', async () => {
    const { files, missing } = await discoverSqlFiles(['top.sql', 'nope'], root);
    expect(files).toEqual([join(root, 'top.sql')]);
    expect(missing).toEqual(['nope']);
  });
});
