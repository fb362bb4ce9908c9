#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cmd } from './commands/index.js';
import { Tracer } from './tracer.js';

void Tracer.run(() => run(cmd, process.argv.slice(2)));
