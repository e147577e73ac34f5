/**
 * Price tokens in generated text: "$14", "$ 9.5", "$1,500.00"
 */

export const PRICE_PATTERN = /\$\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?/

export function parsePrice(token: string): number | null {
  const match = PRICE_PATTERN.exec(token)
  if (!match) return null
  const whole = match[1].replace(/,/g, '')
  const value = Number(match[2] ? `${whole}.${match[2]}` : whole)
  return Number.isFinite(value) ? value : null
}

/**
 * "$12.00" by default; "$12" when `whole` is set and the value has no cents
 */
export function formatPrice(value: number, options: { whole?: boolean } = {}): string {
  const digits = options.whole && Number.isInteger(value) ? 0 : 2
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits })}`
}

/**
 * Relative difference of a mentioned price against the catalog price
 */
export function priceDrift(mentioned: number, actual: number): number {
  if (actual === 0) return mentioned === 0 ? 0 : 1
  return Math.abs(mentioned - actual) / actual
}
