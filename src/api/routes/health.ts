import type { ApiServer } from '../server.js';
import type { SearchService } from '../../search/searchService.js';
import type { HealthResponse } from '../schemas.js';

export function registerHealthRoute(app: ApiServer, service: SearchService): void {
  app.get<{ Reply: HealthResponse }>('/health', async () => {
    const health = await service.health();
    return {
      status: health.status,
      model_loaded: health.modelLoaded,
      collection_count: health.collectionCount,
    };
  });
}
