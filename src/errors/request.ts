import { ListingSearchError } from './base.js';

export class AuthenticationError extends ListingSearchError {
  constructor(message = 'invalid token') {
    super(message, 'AUTHENTICATION_ERROR');
  }
}

/** Raised for where-clauses outside the supported eq / ne / $and subset. */
export class FilterError extends ListingSearchError {
  constructor(message: string) {
    super(message, 'INVALID_FILTER');
  }
}

export class RequestValidationError extends ListingSearchError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
  }
}
