import type { CatalogItem } from '../types'
import { formatPrice } from '../validation/price'

/**
 * Composite text embedded for retrieval
 */
export function buildSearchText(item: CatalogItem): string {
  const parts = [
    item.name,
    item.description,
    `Category: ${item.category}`,
    `Price: ${formatPrice(item.price)}`,
  ]
  if (item.tags.length > 0) parts.push(`Tags: ${item.tags.join(', ')}`)
  if (item.ingredients.length > 0) parts.push(`Ingredients: ${item.ingredients.join(', ')}`)

  return parts.filter(part => part.trim().length > 0).join('. ')
}

/**
 * Everything dietary filtering inspects
 */
export function buildDietaryText(item: CatalogItem): string {
  return [item.name, item.description, ...item.ingredients, ...item.allergens].join(' . ')
}
