import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FileReadError } from '@tokentally/shared';
import { SizeFilter, classifyFileSize } from './filter';

describe('classifyFileSize', () => {
  it('treats the threshold as inclusive', () => {
    expect(classifyFileSize(0, 100)).toBe('process');
    expect(classifyFileSize(100, 100)).toBe('process');
    expect(classifyFileSize(101, 100)).toBe('skip-too-large');
  });
});

describe('SizeFilter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tokentally-size-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('defaults to 1 MiB', () => {
    expect(new SizeFilter().maxFileSize).toBe(1_048_576);
  });

  it('stats the file and classifies it', async () => {
    const small = path.join(tmpDir, 'small.txt');
    const large = path.join(tmpDir, 'large.txt');
    await fs.writeFile(small, 'a'.repeat(10));
    await fs.writeFile(large, 'a'.repeat(11));

    const filter = new SizeFilter(10);
    expect(await filter.check(small)).toEqual({ verdict: 'process', sizeBytes: 10 });
    expect(await filter.check(large)).toEqual({ verdict: 'skip-too-large', sizeBytes: 11 });
  });

  it('wraps stat failures in FileReadError', async () => {
    const filter = new SizeFilter(10);
    await expect(filter.check(path.join(tmpDir, 'missing.txt'))).rejects.toThrow(FileReadError);
  });
});
