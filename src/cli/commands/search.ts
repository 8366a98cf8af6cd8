import type { Command } from 'commander';
import type { WhereClause } from '../../types/search.types.js';
import { isWhereClause } from '../../search/metadataFilter.js';
import { withClient } from '../client.js';
import { parsePositiveInt } from '../options.js';

interface SearchCommandOptions {
  filter?: string;
  limit: number;
  bypassCutoff?: boolean;
}

function parseWhere(raw: string): WhereClause {
  const parsed: unknown = JSON.parse(raw);
  if (!isWhereClause(parsed)) {
    throw new Error('--filter must be a where-clause of $eq / $ne / $and predicates');
  }
  return parsed;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Query a running service')
    .option('--filter <json>', 'Where-clause, e.g. {"status": "active"}')
    .option('--limit <n>', 'Max raw neighbours before the cutoff', parsePositiveInt, 20)
    .option('--bypass-cutoff', 'Print every raw neighbour, skipping the relevance cutoff')
    .action(async (query: string, opts: SearchCommandOptions) => {
      const filters = opts.filter ? parseWhere(opts.filter) : null;
      await withClient(async (client) => {
        const results = await client.search({
          query,
          filters,
          limit: opts.limit,
          bypassCutoff: opts.bypassCutoff ?? false,
        });
        if (results.length === 0) {
          process.stdout.write(`No results found for: ${query}\n`);
          return;
        }
        for (const { pk, distance } of results) {
          process.stdout.write(`${pk}\t${distance.toFixed(4)}\n`);
        }
      });
    });
}
