#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from './config/branding.js';
import { registerSync } from './commands/sync.js';
import { registerPlan } from './commands/plan.js';
import { registerStatus } from './commands/status.js';

// Never block on a credential prompt: use an ssh agent or credential helper
// when one answers, otherwise fetch anonymously.
process.env.GIT_TERMINAL_PROMPT ??= '0';

const program = new Command();

program
  .name(APP_NAME)
  .description('Reconcile a repos file against the git submodules of a host repository')
  .version(APP_VERSION);

registerSync(program);
registerPlan(program);
registerStatus(program);

await program.parseAsync();
