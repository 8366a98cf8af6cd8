import { ListingSearchError } from './base.js';

export class EncodingError extends ListingSearchError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'ENCODING_ERROR', cause);
  }
}
