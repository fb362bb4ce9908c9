import { command } from 'cmd-ts';
import * as path from 'path';
import { logger } from '../log.js';
import { Provisioner } from '../provision.js';
import { Tracer } from '../tracer.js';
import { buildDir, downloadDir, loadManifest, manifest, verbose } from './common.js';

export const commandVerify = command({
  name: 'verify',
  description: 'Verify the cached archives against the manifest without downloading',
  args: { verbose, manifest, buildDir, downloadDir },
  handler: (args) => {
    return Tracer.startRootSpan('command:verify', async () => {
      const loaded = await loadManifest(args);
      const cacheDir = path.resolve(args.downloadDir ?? args.buildDir ?? process.cwd());

      const results = await new Provisioner({ manifest: loaded, logger }).verify(cacheDir);
      const failed = results.filter((r) => r.status !== 'ok');
      if (failed.length > 0) {
        const summary = failed.map((r) => `${r.id} (${r.status})`).join(', ');
        throw new Error('Cached archives failed verification: ' + summary);
      }
      logger.info({ path: cacheDir, count: results.length }, 'Verify:Done');
    });
  },
});
