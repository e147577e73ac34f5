/**
 * Generation parameters per tier and query type
 */

import type { QueryType, Tier } from '../types'
import type { GenerationParams } from '../ai/generation-gateway'

type TierParams = Pick<GenerationParams, 'maxTokens' | 'temperature'>

const LIGHT: TierParams = { maxTokens: 150, temperature: 0.7 }

const BY_TYPE: Record<QueryType, TierParams> = {
  greeting: { maxTokens: 150, temperature: 0.8 },
  menu_query: { maxTokens: 400, temperature: 0.3 },
  specific_item: { maxTokens: 400, temperature: 0.3 },
  price_inquiry: { maxTokens: 250, temperature: 0.3 },
  recommendation: { maxTokens: 300, temperature: 0.6 },
  dietary: { maxTokens: 350, temperature: 0.4 },
  follow_up: { maxTokens: 300, temperature: 0.5 },
  general: { maxTokens: 200, temperature: 0.7 },
}

// Heavy answers have room for multi-part questions
const HEAVY_EXTRA_TOKENS = 150

export function generationParams(tier: Tier, type: QueryType): TierParams {
  if (tier === 'light') {
    return type === 'greeting' ? BY_TYPE.greeting : LIGHT
  }
  const params = BY_TYPE[type]
  if (tier === 'heavy') {
    return { maxTokens: params.maxTokens + HEAVY_EXTRA_TOKENS, temperature: params.temperature }
  }
  return params
}
