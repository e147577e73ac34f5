/**
 * Router - picks the execution tier and owns the only retry in the pipeline
 *
 * Tier selection is a pure function of the classification and what memory
 * knows. Execution tries the chosen tier, then at most one safer tier
 * (Heavy -> MemoryAware -> Light), then gives up with the safe apology.
 */

import type { Logger } from 'pino'
import type { ClassificationResult, Tier } from '../types'
import type { RouterConfig } from '../config/schema'
import type { DecisionContext, DecisionLog } from '../observability/decision-log'
import type { Metrics } from '../observability'
import { isTrivial } from '../classifier/query-classifier'
import { RequestCancelledError, errorMessage } from '../errors'

export interface MemoryPresence {
  /** Memory holds a name or stated preferences */
  hasProfile: boolean
  /** The query points back at something memory cannot resolve */
  clarify: boolean
}

export type RouteReason =
  | 'clarify'
  | 'personal'
  | 'multi_part'
  | 'multi_dietary'
  | 'trivial'
  | 'complexity'
  | 'default'

export interface RouteDecision {
  tier: Tier
  reason: RouteReason
}

/**
 * Next safer tier, or null when nothing is left to fall back to
 */
export const SAFER_TIER: Record<Tier, Tier | null> = {
  'heavy': 'memory-aware',
  'memory-aware': 'light',
  'light': null,
}

export function selectTier(
  classification: ClassificationResult,
  memory: MemoryPresence,
  config: RouterConfig = { heavyThreshold: 3 }
): RouteDecision {
  const signals = new Set(classification.signals)

  if (memory.clarify) return { tier: 'heavy', reason: 'clarify' }
  if (signals.has('personal')) return { tier: 'heavy', reason: 'personal' }
  if (signals.has('multi_part')) return { tier: 'heavy', reason: 'multi_part' }
  if (signals.has('multi_dietary')) return { tier: 'heavy', reason: 'multi_dietary' }
  if (isTrivial(classification) && !memory.hasProfile) return { tier: 'light', reason: 'trivial' }
  if (classification.complexityScore >= config.heavyThreshold) return { tier: 'heavy', reason: 'complexity' }
  return { tier: 'memory-aware', reason: 'default' }
}

export function route(
  classification: ClassificationResult,
  memory: MemoryPresence,
  config?: RouterConfig
): Tier {
  return selectTier(classification, memory, config).tier
}

export interface FallbackOutcome {
  text: string
  /** Tier that produced the text; null when the apology was returned */
  tier: Tier | null
  attempts: Tier[]
  fallbackUsed: boolean
}

export interface ExecuteOptions {
  apology: string
  signal?: AbortSignal
  context?: DecisionContext
  isValid?: (text: string) => boolean
}

export interface RouterOptions {
  router: RouterConfig
  logger: Logger
  decisions?: DecisionLog
  metrics?: Metrics
}

const nonEmpty = (text: string): boolean => text.trim().length > 0

export class Router {
  private logger: Logger

  constructor(private options: RouterOptions) {
    this.logger = options.logger.child({ component: 'router' })
  }

  route(classification: ClassificationResult, memory: MemoryPresence, context: DecisionContext = {}): Tier {
    const decision = selectTier(classification, memory, this.options.router)
    this.options.decisions?.record('route-selected', {
      ...context,
      tier: decision.tier,
      signals: classification.signals,
    }, {
      reason: decision.reason,
      queryType: classification.type,
      complexityScore: classification.complexityScore,
    })
    return decision.tier
  }

  /**
   * Run `run` at `tier`; on failure or an invalid result retry once at the
   * next safer tier. Caller cancellation is rethrown, never retried.
   */
  async executeWithFallback(
    tier: Tier,
    run: (tier: Tier) => Promise<string>,
    options: ExecuteOptions
  ): Promise<FallbackOutcome> {
    const isValid = options.isValid ?? nonEmpty
    const attempts: Tier[] = []
    const candidates = [tier, SAFER_TIER[tier]].filter((t): t is Tier => t !== null)

    for (const current of candidates) {
      if (options.signal?.aborted) throw new RequestCancelledError()
      attempts.push(current)

      let failure: string
      try {
        const text = await run(current)
        if (isValid(text)) {
          return { text, tier: current, attempts, fallbackUsed: attempts.length > 1 }
        }
        failure = 'invalid result'
      } catch (error) {
        if (error instanceof RequestCancelledError) throw error
        failure = errorMessage(error)
      }

      const next = current === candidates[candidates.length - 1] ? null : SAFER_TIER[current]
      if (next) {
        this.options.metrics?.increment('router.fallback', 1, { from: current, to: next })
        this.options.decisions?.record('tier-fallback', { ...options.context, tier: current }, {
          next,
          error: failure,
        })
      } else {
        this.options.decisions?.record('tier-exhausted', { ...options.context, tier: current }, {
          attempts: [...attempts],
          error: failure,
        })
      }
    }

    this.logger.warn({ ...options.context, attempts }, 'Every tier failed, returning apology')
    return { text: options.apology, tier: null, attempts, fallbackUsed: attempts.length > 1 }
  }
}
