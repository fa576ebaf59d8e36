#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  registerRemove,
  registerPlan,
  registerRestore,
  registerDoctor,
  registerConfig,
  registerVersion,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(DESCRIPTION)
  .showHelpAfterError(true);

registerRemove(program);
registerPlan(program);
registerRestore(program);
registerDoctor(program);
registerConfig(program);
registerVersion(program);

await program.parseAsync();
