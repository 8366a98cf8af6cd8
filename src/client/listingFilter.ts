import type { WhereClause } from '../types/search.types.js';

export type ListingType = 'supply_lot' | 'demand_post';

export interface ListingFilterOptions {
  listingType: ListingType;
  /** Listings created by this user are left out of their own results. */
  excludeOwnerId: string | number;
  category?: string;
  country?: string;
}

/**
 * The where-clause the marketplace sends with every search: active listings of
 * one side, not created by the searching user, optionally narrowed to a
 * category and a country.
 */
export function buildListingFilter(options: ListingFilterOptions): WhereClause {
  const clauses: WhereClause[] = [
    { listing_type: { $eq: options.listingType } },
    { status: { $eq: 'active' } },
    { created_by_id: { $ne: options.excludeOwnerId } },
  ];
  if (options.category) clauses.push({ category: { $eq: options.category } });
  if (options.country) clauses.push({ location_country: { $eq: options.country } });
  return { $and: clauses };
}
