import {
  DEFAULT_PLANNER_CONFIG,
  buildPlan,
  logger,
  setLogLevel,
  type BuildingSummary,
  type DailyPlan,
  type PlannerConfig,
  type ScoredTask,
  type WeeklyPlan,
  type WorkerRef,
} from '@fieldplan/core'
import { gatherPlanSources } from './gather'
import type { PlanSourceSet } from './sources'

export type RefreshEvent =
  | { type: 'plan'; generation: number; plan: DailyPlan }
  | { type: 'error'; generation: number; error: Error }

export type RefreshListener = (event: RefreshEvent) => void

export interface PlanRefresherOptions {
  worker: WorkerRef
  sources: PlanSourceSet
  config?: PlannerConfig
  clock?: () => Date
}

type Outcome = { kind: 'plan'; plan: DailyPlan } | { kind: 'error'; error: Error } | { kind: 'stale' }

/**
 * Owns recomputation for one worker. Every refresh takes a new generation and
 * only the newest generation may publish; a failed refresh keeps the last good
 * plan. Source-change bursts go through `requestRefresh`, which debounces.
 */
export class PlanRefresher {
  private readonly worker: WorkerRef
  private readonly sources: PlanSourceSet
  private readonly config: PlannerConfig
  private readonly clock: () => Date
  private readonly listeners = new Set<RefreshListener>()
  private generation = 0
  private plan: DailyPlan | null = null
  private timer: ReturnType<typeof setTimeout> | null = null
  private disposed = false

  constructor(options: PlanRefresherOptions) {
    this.worker = options.worker
    this.sources = options.sources
    this.config = options.config ?? DEFAULT_PLANNER_CONFIG
    this.clock = options.clock ?? (() => new Date())
    // Without an explicit config the level read from the environment stays
    if (options.config) setLogLevel(options.config.logLevel)
  }

  get lastPlan(): DailyPlan | null {
    return this.plan
  }

  get weeklyPlan(): WeeklyPlan | null {
    return this.plan?.weeklyPlan ?? null
  }

  get currentBuilding(): BuildingSummary | null {
    return this.plan?.currentBuilding ?? null
  }

  get orderedUpcoming(): readonly ScoredTask[] {
    return this.plan?.orderedUpcoming ?? []
  }

  get currentGeneration(): number {
    return this.generation
  }

  get hasPendingRefresh(): boolean {
    return this.timer !== null
  }

  subscribe(listener: RefreshListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Recomputes now. Resolves with the new plan, or null when this generation
   * was superseded, failed, or the refresher is disposed. Never rejects.
   */
  async refresh(): Promise<DailyPlan | null> {
    if (this.disposed) return null
    const generation = ++this.generation
    const outcome = await this.compute(generation)

    if (outcome.kind === 'stale') {
      logger.debug('refresh', `Discarded stale plan generation ${generation}`, { latest: this.generation })
      return null
    }
    if (outcome.kind === 'error') {
      logger.error('refresh', 'Plan refresh failed; keeping the previous plan', {
        generation,
        error: outcome.error.message,
      })
      this.emit({ type: 'error', generation, error: outcome.error })
      return null
    }
    this.plan = outcome.plan
    this.emit({ type: 'plan', generation, plan: outcome.plan })
    return outcome.plan
  }

  // Coalesces calls within the debounce window into one refresh
  requestRefresh(): void {
    if (this.disposed) return
    if (this.timer) clearTimeout(this.timer)
    this.timer = setTimeout(() => {
      this.timer = null
      void this.refresh()
    }, this.config.refreshDebounceMs)
  }

  dispose(): void {
    this.disposed = true
    if (this.timer) clearTimeout(this.timer)
    this.timer = null
    this.listeners.clear()
  }

  private async compute(generation: number): Promise<Outcome> {
    try {
      const now = this.clock()
      const sources = await gatherPlanSources(this.sources, this.worker.id, now, this.config)
      if (this.isStale(generation)) return { kind: 'stale' }
      return { kind: 'plan', plan: buildPlan({ worker: this.worker, now, sources, config: this.config }) }
    } catch (err) {
      if (this.isStale(generation)) return { kind: 'stale' }
      return { kind: 'error', error: err instanceof Error ? err : new Error(String(err)) }
    }
  }

  private isStale(generation: number): boolean {
    return this.disposed || generation !== this.generation
  }

  private emit(event: RefreshEvent): void {
    this.listeners.forEach((listener) => {
      try {
        listener(event)
      } catch (err) {
        logger.error('refresh', `Listener failed on ${event.type} event`, {
          generation: event.generation,
          error: err instanceof Error ? err.message : String(err),
        })
      }
    })
  }
}
