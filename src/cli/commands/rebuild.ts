import type { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { documentSchema } from '../../api/schemas.js';
import { withClient } from '../client.js';

const listingsFileSchema = z.union([
  z.array(documentSchema),
  z.object({ listings: z.array(documentSchema) }).transform((file) => file.listings),
]);

export function registerRebuildCommand(program: Command): void {
  program
    .command('rebuild <file>')
    .description('Replace the whole index with the listings in a JSON file')
    .action(async (file: string) => {
      const raw = await readFile(file, 'utf-8');
      const parsed = listingsFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(`${file} must hold [{id, text, metadata}] or {listings: [...]}`);
      }
      const listings = parsed.data;

      await withClient(async (client) => {
        process.stderr.write(`[listing-search] Rebuilding index from ${listings.length} listings...\n`);
        const outcome = await client.rebuild(listings);
        if (!outcome.ok) throw outcome.error;
        process.stdout.write(`Indexed ${outcome.value} listings.\n`);
      });
    });
}
