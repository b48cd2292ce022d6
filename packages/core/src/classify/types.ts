export type ArtifactBucket = 'SOURCE' | 'BINARY' | 'METADATA_EXCLUDED' | 'ROOT';

export interface ArtifactFile {
  /** Absolute path in the working directory */
  path: string;
  bucket: ArtifactBucket;
}
