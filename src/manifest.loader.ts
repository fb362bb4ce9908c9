import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ManifestError } from './errors.js';
import { DigestLength, normalizeDigest } from './hash.js';
import type { LogType } from './log.js';
import type { ArtifactManifestEntry, Manifest } from './manifest.js';

export const DefaultManifestPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'manifest',
  'cross-compiler.json',
);

const DigestRegex = new RegExp(`^[0-9a-f]{${DigestLength}}$`);

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x != null && !Array.isArray(x);
}

function readString(obj: Record<string, unknown>, key: string, source: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') throw new ManifestError(`"${key}" must be a string`, source);
  return value.trim();
}

function parseEntry(input: unknown, source: string): ArtifactManifestEntry {
  if (!isRecord(input)) throw new ManifestError('artifact must be an object', source);
  const id = readString(input, 'id', source);
  const url = readString(input, 'url', source);
  const expectedDigest = normalizeDigest(readString(input, 'expectedDigest', source));
  const extractedDirName = readString(input, 'extractedDirName', source);

  if (!DigestRegex.test(expectedDigest)) {
    throw new ManifestError(`${id}: expectedDigest must be ${DigestLength} hex characters`, source);
  }
  // The marker file and the extracted directory live side by side in the build directory
  if (extractedDirName.includes('/') || extractedDirName.includes('\\') || extractedDirName.startsWith('.')) {
    throw new ManifestError(`${id}: extractedDirName must be a single directory name`, source);
  }
  return Object.freeze({ id, url, expectedDigest, extractedDirName });
}

/**
 * Validated, immutable view of a manifest.
 *
 * Artifacts keep the order they were declared in, downloads happen in that order.
 */
export class ManifestLoader {
  source: string;
  artifacts: ReadonlyMap<string, ArtifactManifestEntry>;
  stages: ReadonlyMap<string, readonly string[]>;

  constructor(source: string, manifest: Manifest) {
    this.source = source;
    const artifacts = new Map<string, ArtifactManifestEntry>();
    for (const input of manifest.artifacts) {
      const entry = parseEntry(input, source);
      if (artifacts.has(entry.id)) throw new ManifestError(`duplicate artifact "${entry.id}"`, source);
      artifacts.set(entry.id, entry);
    }

    const stages = new Map<string, readonly string[]>();
    for (const [stage, ids] of Object.entries(manifest.stages)) {
      for (const id of ids) {
        if (!artifacts.has(id)) throw new ManifestError(`stage "${stage}" references unknown artifact "${id}"`, source);
      }
      stages.set(stage, Object.freeze([...ids]));
    }

    this.artifacts = artifacts;
    this.stages = stages;
    Object.freeze(this);
  }

  static parse(source: string, input: unknown): ManifestLoader {
    if (!isRecord(input)) throw new ManifestError('expected an object', source);
    const { artifacts, stages } = input;
    if (!Array.isArray(artifacts)) throw new ManifestError('"artifacts" must be an array', source);
    if (stages != null && !isRecord(stages)) throw new ManifestError('"stages" must be an object', source);

    const stageList: Record<string, string[]> = {};
    for (const [stage, ids] of Object.entries(stages ?? {})) {
      if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
        throw new ManifestError(`stage "${stage}" must be a list of artifact ids`, source);
      }
      stageList[stage] = ids;
    }
    return new ManifestLoader(source, { artifacts, stages: stageList });
  }

  static async load(fileName: string, log: LogType): Promise<ManifestLoader> {
    if (!fileName.endsWith('.json')) throw new ManifestError('manifest must be a json file', fileName);
    const buf = await fs.readFile(fileName);
    let input: unknown;
    try {
      input = JSON.parse(buf.toString());
    } catch (e) {
      throw new ManifestError(`failed to parse json (${String(e)})`, fileName);
    }
    const manifest = ManifestLoader.parse(fileName, input);
    log.debug(
      { path: fileName, artifacts: manifest.artifacts.size, stages: [...manifest.stages.keys()] },
      'Manifest:Load',
    );
    return manifest;
  }

  /** Load the manifest shipped with the package */
  static loadDefault(log: LogType): Promise<ManifestLoader> {
    return ManifestLoader.load(DefaultManifestPath, log);
  }

  get(id: string): ArtifactManifestEntry {
    const entry = this.artifacts.get(id);
    if (entry == null) throw new ManifestError(`unknown artifact "${id}"`, this.source);
    return entry;
  }

  /** Artifacts extracted by a stage, in the order the stage lists them */
  stage(name: string): ArtifactManifestEntry[] {
    const ids = this.stages.get(name);
    if (ids == null) {
      const known = [...this.stages.keys()].join(', ');
      throw new ManifestError(`unknown stage "${name}", expected one of ${known}`, this.source);
    }
    return ids.map((id) => this.get(id));
  }

  toJson(): Manifest {
    const stages: Record<string, string[]> = {};
    for (const [stage, ids] of this.stages) stages[stage] = [...ids];
    return { artifacts: [...this.artifacts.values()], stages };
  }
}
