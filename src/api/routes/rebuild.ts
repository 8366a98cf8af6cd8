import type { ApiServer } from '../server.js';
import type { SearchService } from '../../search/searchService.js';
import { rebuildBodySchema } from '../schemas.js';
import type { RebuildBody, RebuildResponse } from '../schemas.js';
import { parseRequest } from '../validation.js';

export function registerRebuildRoute(app: ApiServer, service: SearchService): void {
  app.post<{ Body: RebuildBody; Reply: RebuildResponse }>('/rebuild', async (req) => {
    const { listings } = parseRequest(rebuildBodySchema, req.body);
    const result = await service.rebuild(listings);
    if (result.failedIds.length > 0) {
      req.log.warn({ failedIds: result.failedIds }, 'some listings were skipped during rebuild');
    }
    return { ok: true, count: result.count };
  });
}
