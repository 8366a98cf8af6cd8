export { ListingSearchError } from './base.js';
export { EncodingError } from './encoding.js';
export { IndexStoreError } from './indexStore.js';
export { AuthenticationError, FilterError, RequestValidationError } from './request.js';
