export interface ArtifactManifestEntry {
  /** Unique key, eg "binutils" */
  id: string;
  /** Upstream archive location, the last path segment names the cached file */
  url: string;
  /** Lower case hex SHA-512 of the archive */
  expectedDigest: string;
  /** Top level directory the archive unpacks into */
  extractedDirName: string;
}

export interface Manifest {
  artifacts: ArtifactManifestEntry[];
  /** Stage name to the ids of the artifacts the stage extracts */
  stages: Record<string, string[]>;
}

export interface DownloadResult {
  path: string;
  /** Verified digest, always equal to the entry's expected digest */
  digest: string;
  size: number;
  source: 'cache' | 'network';
}
