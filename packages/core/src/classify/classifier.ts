import * as path from 'path';
import { ArtifactBucket, ArtifactFile } from './types';

// Checksum bookkeeping written by the build, and SCM metadata
const EXCLUDED_TERMS = ['scm', 'sha1.properties', 'sha256.properties'];

/**
 * Buckets a candidate file by substring match on its name.
 * `foo-src.zip` and `srcfoo.zip` are both SOURCE; exclusion terms win over `src` and `bin`.
 */
export function classifyName(fileName: string): ArtifactBucket {
  if (EXCLUDED_TERMS.some((term) => fileName.includes(term))) return 'METADATA_EXCLUDED';
  if (fileName.includes('src')) return 'SOURCE';
  if (fileName.includes('bin')) return 'BINARY';
  return 'ROOT';
}

export function classifyFile(filePath: string): ArtifactFile {
  return { path: filePath, bucket: classifyName(path.basename(filePath)) };
}

/** Relative destination of a bucket inside the checkout, or undefined when it is not staged. */
export function bucketDirectory(bucket: ArtifactBucket): string | undefined {
  switch (bucket) {
    case 'SOURCE':
      return 'source';
    case 'BINARY':
      return 'binaries';
    case 'ROOT':
      return '';
    case 'METADATA_EXCLUDED':
      return undefined;
  }
}
