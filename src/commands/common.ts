import { boolean, flag, option, optional, string } from 'cmd-ts';
import { performance } from 'perf_hooks';
import { logger, setVerbose } from '../log.js';
import { ManifestLoader } from '../manifest.loader.js';

export const verbose = flag({
  long: 'verbose',
  type: boolean,
  defaultValue: () => false,
  description: 'Verbose logging',
});
export const manifest = option({
  long: 'manifest',
  type: optional(string),
  description: 'Manifest json to use instead of the built in cross compiler manifest',
});
export const downloadDir = option({
  long: 'download-dir',
  type: optional(string),
  description: 'Directory downloaded archives are cached in, defaults to the build directory',
});
export const buildDir = option({
  long: 'build-dir',
  type: optional(string),
  description: 'Directory archives are extracted in, defaults to the current directory',
});

/** Track ms since a performance.now() call limited to 4dp */
export function msSince(lastTick: number): number {
  return Number((performance.now() - lastTick).toFixed(4));
}

export function loadManifest(args: { verbose: boolean; manifest?: string }): Promise<ManifestLoader> {
  if (args.verbose) setVerbose();
  if (args.manifest == null) return ManifestLoader.loadDefault(logger);
  return ManifestLoader.load(args.manifest, logger);
}
