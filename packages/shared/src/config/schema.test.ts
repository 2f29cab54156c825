import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EXTENSIONS,
  DEFAULT_MAX_FILE_SIZE,
  normalizeExtensions,
  parseCountConfig,
} from './schema';
import { ConfigError } from '../errors';

describe('normalizeExtensions', () => {
  it('prepends a dot to bare extensions', () => {
    expect(normalizeExtensions('py,js')).toEqual(['.py', '.js']);
    expect(normalizeExtensions('py,js')).toEqual(normalizeExtensions('.py,.js'));
  });

  it('trims entries and drops empty ones', () => {
    expect(normalizeExtensions(' py , .md,,')).toEqual(['.py', '.md']);
    expect(normalizeExtensions('')).toEqual([]);
  });

  it('keeps case and removes duplicates', () => {
    expect(normalizeExtensions(['PY', 'py', '.py'])).toEqual(['.PY', '.py']);
  });
});

describe('parseCountConfig', () => {
  it('fills in defaults', () => {
    const config = parseCountConfig({});
    expect(config.extensions).toEqual([...DEFAULT_EXTENSIONS]);
    expect(config.extensions).toHaveLength(30);
    expect(config.maxFileSize).toBe(DEFAULT_MAX_FILE_SIZE);
    expect(config.maxFileSize).toBe(1_048_576);
    expect(config.verbose).toBe(false);
    expect(config.json).toBe(false);
  });

  it('coerces the max file size from a flag string', () => {
    expect(parseCountConfig({ maxFileSize: '2048' }).maxFileSize).toBe(2048);
    expect(parseCountConfig({ maxFileSize: '0' }).maxFileSize).toBe(0);
    expect(parseCountConfig({ maxFileSize: ' 512 ' }).maxFileSize).toBe(512);
    expect(parseCountConfig({ maxFileSize: 4096 }).maxFileSize).toBe(4096);
  });

  it('normalizes extensions given as a flag string', () => {
    expect(parseCountConfig({ extensions: 'ts,tsx' }).extensions).toEqual(['.ts', '.tsx']);
  });

  it.each(['abc', '-1', '1.5', '', '  ', '1e3', '0x10', -1, 1.5])('rejects max file size %j', (value) => {
    expect(() => parseCountConfig({ maxFileSize: value })).toThrow(ConfigError);
    expect(() => parseCountConfig({ maxFileSize: value })).toThrow(/--max-file-size/);
  });

  it('says what a max file size must look like', () => {
    expect(() => parseCountConfig({ maxFileSize: '1e3' })).toThrow(
      'Invalid options: --max-file-size: Expected a non-negative integer',
    );
  });
});
