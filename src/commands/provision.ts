import { command, option, string } from 'cmd-ts';
import * as path from 'path';
import { logger } from '../log.js';
import { type ProvisionDirs, Provisioner } from '../provision.js';
import { Tracer } from '../tracer.js';
import { buildDir, downloadDir, loadManifest, manifest, verbose } from './common.js';

export function resolveDirs(args: { destDir: string; buildDir?: string; downloadDir?: string }): ProvisionDirs {
  const build = path.resolve(args.buildDir ?? process.cwd());
  return {
    destDir: path.resolve(args.destDir),
    buildDir: build,
    downloadDir: args.downloadDir == null ? build : path.resolve(args.downloadDir),
  };
}

export const commandProvision = command({
  name: 'provision',
  description: 'Download, verify and extract the sources for a build stage',
  args: {
    verbose,
    manifest,
    buildDir,
    downloadDir,
    destDir: option({
      long: 'dest-dir',
      type: string,
      description: 'Directory the cross compiler will be installed into',
    }),
    stage: option({
      long: 'stage',
      type: string,
      defaultValue: () => 'binutils',
      defaultValueIsSerializable: true,
      description: 'Build stage whose sources are extracted',
    }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:provision', async (span) => {
      const loaded = await loadManifest(args);
      const dirs = resolveDirs(args);
      span.setAttribute('stage', args.stage);

      const provisioner = new Provisioner({ manifest: loaded, logger });
      const stats = await provisioner.run(args.stage, dirs);

      span.setAttribute('downloaded', stats.downloaded);
      span.setAttribute('downloadedBytes', stats.downloadedBytes);
      span.setAttribute('cached', stats.cached);
      span.setAttribute('extracted', stats.extracted);
    });
  },
});
