import { describe, it, expect } from 'vitest';
import path from 'path';
import { bucketDirectory, classifyFile, classifyName } from './classifier';

describe('classifyName', () => {
  it.each([
    ['foo-1.0-src.zip', 'SOURCE'],
    ['foo-1.0-src.tar.gz', 'SOURCE'],
    ['foo-1.0-bin.tar.gz', 'BINARY'],
    ['foo-1.0-bin.zip', 'BINARY'],
    ['RELEASE-NOTES.txt', 'ROOT'],
    ['KEYS', 'ROOT'],
    ['sha1.properties', 'METADATA_EXCLUDED'],
    ['sha256.properties', 'METADATA_EXCLUDED'],
    ['scm', 'METADATA_EXCLUDED'],
  ])('classifies %s as %s', (name, bucket) => {
    expect(classifyName(name)).toBe(bucket);
  });

  it('matches on substrings anywhere in the name', () => {
    expect(classifyName('srcfoo.zip')).toBe('SOURCE');
    expect(classifyName('cabinet.zip')).toBe('BINARY');
  });

  it('prefers src over bin', () => {
    expect(classifyName('foo-src-bin.zip')).toBe('SOURCE');
  });

  it('lets exclusion terms win over src and bin', () => {
    expect(classifyName('src-sha1.properties')).toBe('METADATA_EXCLUDED');
    expect(classifyName('bin-sha256.properties')).toBe('METADATA_EXCLUDED');
    expect(classifyName('foo-src-scm.zip')).toBe('METADATA_EXCLUDED');
  });

  it('is case-sensitive', () => {
    expect(classifyName('FOO-SRC.zip')).toBe('ROOT');
  });
});

describe('classifyFile', () => {
  it('classifies by base name only', () => {
    const file = path.join('/work', 'src', 'foo-1.0-bin.zip');
    expect(classifyFile(file)).toEqual({ path: file, bucket: 'BINARY' });
  });
});

describe('bucketDirectory', () => {
  it('maps buckets to checkout subdirectories', () => {
    expect(bucketDirectory('SOURCE')).toBe('source');
    expect(bucketDirectory('BINARY')).toBe('binaries');
    expect(bucketDirectory('ROOT')).toBe('');
    expect(bucketDirectory('METADATA_EXCLUDED')).toBeUndefined();
  });
});
