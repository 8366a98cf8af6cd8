import type { ApiServer } from '../server.js';
import type { SearchService } from '../../search/searchService.js';
import { removeBodySchema } from '../schemas.js';
import type { OkResponse, RemoveBody } from '../schemas.js';
import { parseRequest } from '../validation.js';

export function registerRemoveRoute(app: ApiServer, service: SearchService): void {
  app.post<{ Body: RemoveBody; Reply: OkResponse }>('/remove', async (req) => {
    const { id } = parseRequest(removeBodySchema, req.body);
    await service.remove(id);
    return { ok: true };
  });
}
