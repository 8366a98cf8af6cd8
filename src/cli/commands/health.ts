import type { Command } from 'commander';
import { withClient } from '../client.js';

export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Print the health of a running service')
    .action(async () => {
      await withClient(async (client) => {
        const health = await client.health();
        process.stdout.write(`${JSON.stringify(health, null, 2)}\n`);
      });
    });
}
