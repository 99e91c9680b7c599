import { getLogger, ROOT_CATEGORY } from '@flowgate/telemetry'
import { validateFeasibility, type RejectionReason } from './feasibility.js'
import { compareFlowSpecKeys } from './ordering.js'
import type { FeasibilityConfig, FlowSpecEntry, UnicastRib } from './types.js'

export interface Rejection {
  entry: FlowSpecEntry
  reason: RejectionReason
  error: string
}

export interface TablePlan {
  success: true
  prevEntries: readonly FlowSpecEntry[]
  newEntries: readonly FlowSpecEntry[]
  added: FlowSpecEntry[]
  /** Candidates that failed validation. */
  rejected: Rejection[]
  /** Installed entries that are no longer feasible. */
  withdrawn: Rejection[]
}

export interface TablePlanFailure {
  success: false
  error: string
}

export type TablePlanResult = TablePlan | TablePlanFailure

export interface TableCommitResult {
  success: true
  entries: readonly FlowSpecEntry[]
  added: FlowSpecEntry[]
  rejected: Rejection[]
  withdrawn: Rejection[]
}

function byPrecedence(a: FlowSpecEntry, b: FlowSpecEntry): number {
  return compareFlowSpecKeys(a.key, b.key)
}

/**
 * Installed FlowSpec rules, kept in precedence order.
 *
 * Candidates are checked for feasibility against the unicast RIB before they
 * are installed, and installed rules can be rechecked after the RIB changes.
 * Rejections and withdrawals are logged here; the decision procedures
 * themselves stay silent.
 */
export class FlowSpecTable {
  private readonly logger = getLogger([ROOT_CATEGORY, 'table'])
  private entries: readonly FlowSpecEntry[] = []

  constructor(
    private readonly rib: UnicastRib,
    private readonly config?: FeasibilityConfig
  ) {}

  getEntries(): readonly FlowSpecEntry[] {
    return this.entries
  }

  /**
   * Work out what installing `candidates` would change. Validates against
   * the RIB but leaves the installed entries alone until `commit()`.
   *
   * A candidate replaces an installed entry with the same id. A rejected
   * candidate leaves the installed entry in place.
   */
  plan(candidates: readonly FlowSpecEntry[]): TablePlanResult {
    const seen = new Set<string>()
    for (const candidate of candidates) {
      if (seen.has(candidate.id)) {
        return { success: false, error: `duplicate FlowSpec entry id: ${candidate.id}` }
      }
      seen.add(candidate.id)
    }

    const added: FlowSpecEntry[] = []
    const rejected: Rejection[] = []
    for (const entry of candidates) {
      const result = validateFeasibility(entry.route, this.rib, this.config)
      if (result.valid) {
        added.push(entry)
      } else {
        rejected.push({ entry, reason: result.reason, error: result.error })
      }
    }

    const replaced = new Set(added.map((e) => e.id))
    const kept = this.entries.filter((e) => !replaced.has(e.id))
    const newEntries = [...kept, ...added].sort(byPrecedence)

    return {
      success: true,
      prevEntries: this.entries,
      newEntries,
      added,
      rejected,
      withdrawn: [],
    }
  }

  /**
   * Recheck every installed entry against the current RIB and plan the
   * withdrawal of those that are no longer feasible.
   */
  planRevalidation(): TablePlan {
    const kept: FlowSpecEntry[] = []
    const withdrawn: Rejection[] = []
    for (const entry of this.entries) {
      const result = validateFeasibility(entry.route, this.rib, this.config)
      if (result.valid) {
        kept.push(entry)
      } else {
        withdrawn.push({ entry, reason: result.reason, error: result.error })
      }
    }

    return {
      success: true,
      prevEntries: this.entries,
      newEntries: kept,
      added: [],
      rejected: [],
      withdrawn,
    }
  }

  /**
   * Apply a plan produced by `plan()` or `planRevalidation()`.
   */
  commit(plan: TablePlan): TableCommitResult {
    if (plan.prevEntries !== this.entries) {
      this.logger.warn`Committing a stale plan: table changed since it was computed`
    }

    for (const { entry, reason, error } of plan.rejected) {
      this.logger.warn('Rejected FlowSpec entry {id}: {error}', { id: entry.id, reason, error })
    }
    for (const { entry, reason, error } of plan.withdrawn) {
      this.logger.warn('Withdrawing FlowSpec entry {id}: {error}', { id: entry.id, reason, error })
    }

    this.entries = plan.newEntries
    this.logger.info(
      'FlowSpec table updated: {added} added, {rejected} rejected, {withdrawn} withdrawn, {total} installed',
      {
        added: plan.added.length,
        rejected: plan.rejected.length,
        withdrawn: plan.withdrawn.length,
        total: this.entries.length,
      }
    )

    return {
      success: true,
      entries: this.entries,
      added: plan.added,
      rejected: plan.rejected,
      withdrawn: plan.withdrawn,
    }
  }

  /**
   * Plan and commit in one step.
   */
  install(candidates: readonly FlowSpecEntry[]): TableCommitResult | TablePlanFailure {
    const plan = this.plan(candidates)
    if (!plan.success) {
      this.logger.error`FlowSpec install failed: ${plan.error}`
      return plan
    }
    return this.commit(plan)
  }

  /**
   * Recheck installed entries after a RIB change and withdraw the ones that
   * are no longer feasible.
   */
  revalidate(): TableCommitResult {
    return this.commit(this.planRevalidation())
  }

  /**
   * Remove an entry by id. Returns whether it was installed.
   */
  withdraw(id: string): boolean {
    const next = this.entries.filter((e) => e.id !== id)
    if (next.length === this.entries.length) return false
    this.entries = next
    this.logger.info('Withdrew FlowSpec entry {id}', { id })
    return true
  }
}
