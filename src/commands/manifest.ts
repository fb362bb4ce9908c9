import { command } from 'cmd-ts';
import { cacheFileName } from '../download.js';
import { logger } from '../log.js';
import { loadManifest, manifest, verbose } from './common.js';

export const commandManifest = command({
  name: 'manifest',
  description: 'Show the artifacts and stages of a manifest',
  args: { verbose, manifest },
  handler: async (args) => {
    const loaded = await loadManifest(args);
    for (const entry of loaded.artifacts.values()) {
      logger.info({ ...entry, fileName: cacheFileName(entry) }, 'Manifest:Artifact');
    }
    for (const [stage, ids] of loaded.stages) logger.info({ stage, extract: ids }, 'Manifest:Stage');
  },
});
