#!/usr/bin/env node

// Set process title for easy identification in ps/pgrep/pkill
process.title = 'pathwise-cli';

import { showHelp } from './cli/commands/help.js';
import { runLongest } from './cli/commands/longest.js';
import { configPath, configReset, configSet, configShow } from './cli/commands/config.js';
import { startServer } from './index.js';
import * as ui from './cli/ui.js';

// CLI with subcommand pattern
const args = process.argv.slice(2);
const mainCommand = args[0];
const subCommand = args[1];

function runConfig(): number {
  switch (subCommand) {
    case 'show':
      return configShow();
    case 'set':
      return configSet(args[2], args[3]);
    case 'reset':
      return configReset(args[2]);
    case 'path':
      return configPath();
    default:
      ui.error('Usage: pathwise config <show|set|reset|path>');
      return 1;
  }
}

if (mainCommand === 'mcp') {
  if (subCommand === 'start') {
    startServer().catch((error: unknown) => {
      ui.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  } else {
    ui.error('Usage: pathwise mcp start');
    process.exitCode = 1;
  }
} else if (mainCommand === 'longest') {
  process.exitCode = runLongest(args.slice(1));
} else if (mainCommand === 'config') {
  process.exitCode = runConfig();
} else if (mainCommand === 'help' || !mainCommand) {
  process.exitCode = showHelp();
} else {
  ui.error(`Unknown command: ${mainCommand}`);
  showHelp();
  process.exitCode = 1;
}
