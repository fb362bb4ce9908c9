import { command, restPositionals, string } from 'cmd-ts';
import { hashFile } from '../hash.js';
import { logger, setVerbose } from '../log.js';
import { verbose } from './common.js';

export const commandHash = command({
  name: 'hash',
  description: 'Log the SHA-512 of files, for pinning new versions in a manifest',
  args: {
    verbose,
    files: restPositionals({ type: string, displayName: 'FILE' }),
  },
  handler: async (args) => {
    if (args.verbose) setVerbose();
    if (args.files.length === 0) throw new Error('No files to hash');
    for (const file of args.files) {
      const digest = await hashFile(file);
      logger.info({ path: file, hash: digest }, 'Hash:File');
    }
  },
});
