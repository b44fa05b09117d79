#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerServeCommand } from './commands/serve.js';
import { registerClientCommand } from './commands/client.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerConfigCommands } from './commands/config.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // dist/../package.json when installed, src/../package.json in development
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('cid-rotor')
  .description('Connection ID rotation lifecycle manager')
  .version(version);

// Register commands
registerServeCommand(program);
registerClientCommand(program);
registerAnalyzeCommand(program);
registerConfigCommands(program);

// Parse arguments
await program.parseAsync();
