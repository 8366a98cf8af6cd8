import type { ApiServer } from '../server.js';
import type { SearchService } from '../../search/searchService.js';
import { indexBodySchema } from '../schemas.js';
import type { IndexBody, OkResponse } from '../schemas.js';
import { parseRequest } from '../validation.js';

export function registerIndexRoute(app: ApiServer, service: SearchService): void {
  app.post<{ Body: IndexBody; Reply: OkResponse }>('/index', async (req) => {
    const doc = parseRequest(indexBodySchema, req.body);
    await service.index(doc);
    return { ok: true };
  });
}
