import type { ApiServer } from '../server.js';
import type { SearchService } from '../../search/searchService.js';
import { parseFilter } from '../../search/metadataFilter.js';
import { searchBodySchema, searchQuerySchema } from '../schemas.js';
import type { SearchBody, SearchQuery, SearchResponse } from '../schemas.js';
import { parseRequest } from '../validation.js';

export function registerSearchRoute(app: ApiServer, service: SearchService): void {
  app.post<{ Body: SearchBody; Querystring: SearchQuery; Reply: SearchResponse }>(
    '/search',
    async (req) => {
      const { query, filters, limit } = parseRequest(searchBodySchema, req.body);
      const flags = parseRequest(searchQuerySchema, req.query);

      const { results, debug } = await service.search(query, {
        filter: parseFilter(filters),
        limit,
        bypassCutoff: flags.bypass_cutoff,
      });

      if (!flags.debug && !flags.bypass_cutoff) {
        return { results };
      }
      return {
        results,
        debug: {
          bypass_cutoff: debug.bypassCutoff,
          raw_count: debug.rawCount,
          raw_pks: debug.rawPks,
          raw_distances: debug.rawDistances,
          keep_count: debug.keepCount,
        },
      };
    },
  );
}
