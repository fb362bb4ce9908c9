import { subcommands } from 'cmd-ts';
import { getVersion } from '../version.js';
import { commandHash } from './hash.js';
import { commandManifest } from './manifest.js';
import { commandProvision } from './provision.js';
import { commandVerify } from './verify.js';

export const cmd = subcommands({
  name: 'cts',
  description: 'Cross toolchain sources - download, verify and extract cross compiler sources',
  version: getVersion().version ?? 'unknown',
  cmds: { provision: commandProvision, verify: commandVerify, hash: commandHash, manifest: commandManifest },
});
