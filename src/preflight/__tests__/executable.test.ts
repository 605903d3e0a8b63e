import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { delimiter, join } from 'path';
import { findExecutable } from '../executable.js';

describe.skipIf(process.platform === 'win32')('findExecutable', () => {
  let testDir: string;
  let binDir: string;
  let otherDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'ocr-deploy-path-'));
    binDir = join(testDir, 'bin');
    otherDir = join(testDir, 'other');
    await mkdir(binDir);
    await mkdir(otherDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should return the path of an executable found on PATH', async () => {
    const runtime = join(binDir, 'python3');
    await writeFile(runtime, '#!/bin/sh\n');
    await chmod(runtime, 0o755);

    expect(findExecutable('python3', [otherDir, binDir].join(delimiter))).toBe(runtime);
  });

  it('should prefer the first PATH entry that has the executable', async () => {
    for (const dir of [otherDir, binDir]) {
      await writeFile(join(dir, 'python3'), '#!/bin/sh\n');
      await chmod(join(dir, 'python3'), 0o755);
    }

    expect(findExecutable('python3', [otherDir, binDir].join(delimiter))).toBe(join(otherDir, 'python3'));
  });

  it('should skip files without an execute bit', async () => {
    const runtime = join(binDir, 'python3');
    await writeFile(runtime, '#!/bin/sh\n');
    await chmod(runtime, 0o644);

    expect(findExecutable('python3', binDir)).toBeUndefined();
  });

  it('should skip directories with the same name', async () => {
    await mkdir(join(binDir, 'python3'));

    expect(findExecutable('python3', binDir)).toBeUndefined();
  });

  it('should return undefined for an empty or missing PATH', () => {
    expect(findExecutable('python3', '')).toBeUndefined();
    expect(findExecutable('python3', undefined)).toBeUndefined();
  });
});

describe('findExecutable on Windows', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'ocr-deploy-pathext-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should try each PATHEXT extension across semicolon-separated entries', async () => {
    const missing = join(testDir, 'missing');
    const runtime = join(testDir, 'python3.CMD');
    await writeFile(runtime, '@echo off\r\n');
    await chmod(runtime, 0o755);

    const found = findExecutable('python3', [missing, testDir].join(';'), {
      platform: 'win32',
      pathExt: '.EXE;.CMD'
    });

    expect(found).toBe(runtime);
  });

  it('should not match the bare name when PATHEXT lists no empty extension', async () => {
    const runtime = join(testDir, 'python3');
    await writeFile(runtime, '#!/bin/sh\n');
    await chmod(runtime, 0o755);

    expect(findExecutable('python3', testDir, { platform: 'win32', pathExt: '.EXE' })).toBeUndefined();
  });
});
