export { CatalogIndex, CatalogItemInputSchema } from './catalog-index'
export type { CatalogItemInput, CatalogIndexOptions, IndexOptions, SearchOptions } from './catalog-index'
export { detectRestrictions, getRestriction, violatesRestriction, RESTRICTIONS } from './dietary'
export type { Restriction, RestrictionKind } from './dietary'
export { buildSearchText } from './searchable-text'
