#!/usr/bin/env node

import { Command } from 'commander';
import { registerDialogCommands } from './commands/dialog.js';
import { registerInputCommand } from './commands/input.js';
import { registerListCommands } from './commands/list.js';
import { registerGaugeCommand } from './commands/gauge.js';
import { registerDemoCommand } from './commands/demo.js';
import { registerConfigCommand } from './commands/config.js';
import { handleError } from './utils/errors.js';

const program = new Command();

program
  .name('wtui')
  .description('Drive whiptail dialogs from scripts: message boxes, menus, lists, input, gauges')
  .version('0.1.0');

// Register all commands
registerDialogCommands(program);
registerInputCommand(program);
registerListCommands(program);
registerGaugeCommand(program);
registerDemoCommand(program);
registerConfigCommand(program);

program.parseAsync().catch(handleError);
