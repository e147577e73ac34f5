export { ResponseValidator, matchItem } from './response-validator'
export type { CatalogReader, Correction, MatchMethod, MatchResult, ResponseValidatorOptions, ValidationReport } from './response-validator'
export { formatPrice, parsePrice, priceDrift, PRICE_PATTERN } from './price'
