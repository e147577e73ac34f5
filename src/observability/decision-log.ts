/**
 * Decision Log
 *
 * Captures why the engine deviated from the happy path: tier fallbacks,
 * degraded collaborators, validator corrections and hallucination
 * candidates. Events are logged and kept in a bounded in-memory buffer so
 * a request's decision path can be reconstructed afterwards.
 */

import type { Logger } from 'pino'
import type { Signal, Tier } from '../types'

export type DecisionKind =
  | 'route-selected'
  | 'tier-fallback'
  | 'tier-exhausted'
  | 'cache-hit'
  | 'cache-degraded'
  | 'embedding-degraded'
  | 'storage-degraded'
  | 'price-corrected'
  | 'name-corrected'
  | 'hallucination-candidate'
  | 'ambiguous-item'
  | 'catalog-missing'
  | 'clarification-requested'
  | 'request-failed'

/**
 * Warning-class kinds are logged at warn level, the rest at info
 */
const WARNING_KINDS: ReadonlySet<DecisionKind> = new Set<DecisionKind>([
  'tier-fallback',
  'tier-exhausted',
  'cache-degraded',
  'embedding-degraded',
  'storage-degraded',
  'hallucination-candidate',
  'catalog-missing',
  'request-failed',
])

export interface DecisionContext {
  merchantId?: string
  customerId?: string
  tier?: Tier
  signals?: Signal[]
}

export interface DecisionEvent {
  kind: DecisionKind
  timestamp: number
  context: DecisionContext
  detail: Record<string, unknown>
}

export class DecisionLog {
  private events: DecisionEvent[] = []

  constructor(
    private logger: Logger,
    private capacity: number = 1000
  ) {}

  record(kind: DecisionKind, context: DecisionContext, detail: Record<string, unknown> = {}): DecisionEvent {
    const event: DecisionEvent = { kind, timestamp: Date.now(), context, detail }

    this.events.push(event)
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity)
    }

    const payload = { decision: kind, ...context, ...detail }
    if (WARNING_KINDS.has(kind)) {
      this.logger.warn(payload, `decision: ${kind}`)
    } else {
      this.logger.info(payload, `decision: ${kind}`)
    }

    return event
  }

  /**
   * Events, optionally narrowed to one kind and/or merchant
   */
  list(filter?: { kind?: DecisionKind; merchantId?: string }): DecisionEvent[] {
    return this.events.filter(event =>
      (!filter?.kind || event.kind === filter.kind) &&
      (!filter?.merchantId || event.context.merchantId === filter.merchantId)
    )
  }

  clear(): void {
    this.events = []
  }
}
