/**
 * A downloaded artifact did not hash to the digest pinned in the manifest.
 *
 * The file is left where it was written, the next run will verify it again
 * and download a replacement.
 */
export class IntegrityError extends Error {
  artifactId: string;
  url: string;
  expected: string;
  actual: string;

  constructor(artifactId: string, url: string, expected: string, actual: string) {
    super(`SHA-512 of ${artifactId} downloaded from ${url} differs: got ${actual} but expected ${expected}`);
    this.name = this.constructor.name;
    this.artifactId = artifactId;
    this.url = url;
    this.expected = expected;
    this.actual = actual;
  }
}

/** An archive could not be unpacked into the expected directory */
export class ExtractionError extends Error {
  artifactId: string | null;
  reason: string;
  path: string;

  constructor(reason: string, path: string, artifactId: string | null = null) {
    super(artifactId == null ? `${reason}: ${path}` : `${artifactId}: ${reason}: ${path}`);
    this.name = this.constructor.name;
    this.reason = reason;
    this.path = path;
    this.artifactId = artifactId;
  }
}

export class ManifestError extends Error {
  source: string;

  constructor(msg: string, source: string) {
    super(`Invalid manifest ${source}: ${msg}`);
    this.name = this.constructor.name;
    this.source = source;
  }
}
