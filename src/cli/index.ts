#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerServeCommand } from './commands/serve.js';
import { registerRebuildCommand } from './commands/rebuild.js';
import { registerSearchCommand } from './commands/search.js';
import { registerHealthCommand } from './commands/health.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('listing-search')
    .description(pkg.description)
    .version(pkg.version);

  registerServeCommand(program);
  registerRebuildCommand(program);
  registerSearchCommand(program);
  registerHealthCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[listing-search] Error: ${message}\n`);
  process.exit(1);
});
