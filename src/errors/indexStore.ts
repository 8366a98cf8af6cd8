import { ListingSearchError } from './base.js';

export class IndexStoreError extends ListingSearchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INDEX_STORE_ERROR', cause);
  }
}
