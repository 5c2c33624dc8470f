import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { tempPath, writeFileAtomic } from './files.js';

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gallery-fetch-files-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('creates missing directories and leaves no temp file behind', async () => {
    const target = path.join(dir, 'nested', 'a.jpg');
    await writeFileAtomic(target, Buffer.from('one'));
    expect(await fs.readFile(target, 'utf8')).toBe('one');
    expect(await fs.readdir(path.dirname(target))).toEqual(['a.jpg']);
  });

  it('overwrites an existing file', async () => {
    const target = path.join(dir, 'a.jpg');
    await fs.writeFile(target, 'old');
    await writeFileAtomic(target, Buffer.from('new'));
    expect(await fs.readFile(target, 'utf8')).toBe('new');
  });

  it('rethrows when the target directory cannot be created', async () => {
    await fs.writeFile(path.join(dir, 'blocker'), 'file');
    await expect(writeFileAtomic(path.join(dir, 'blocker', 'a.jpg'), Buffer.from('x'))).rejects.toThrow();
    expect(await fs.readdir(dir)).toEqual(['blocker']);
  });
});

describe('tempPath', () => {
  it('appends .part beside the target', () => {
    expect(tempPath('/out', 'a.jpg')).toBe(path.join('/out', 'a.jpg.part'));
  });
});
