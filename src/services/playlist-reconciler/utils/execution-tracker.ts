import type {
  ConflictInfo,
  ExecutionOutcome,
  SkippedStep,
  SkipReason,
  StepError,
  StepErrorKind,
} from '@root/types/reconcile.types.js'
import { getRemoteFailure } from '@utils/remote-errors.js'

/**
 * Accumulates what happened while a plan was applied: applied count,
 * per-step errors, skipped steps and a version conflict if one stopped
 * the run.
 */
export class ExecutionTracker {
  private _applied = 0
  private readonly _errors: StepError[] = []
  private readonly _skipped: SkippedStep[] = []
  private _conflict: ConflictInfo | null = null

  constructor(private _version: string) {}

  get version(): string {
    return this._version
  }

  get applied(): number {
    return this._applied
  }

  /** Records a successful mutation and the version token it returned */
  recordMutation(version: string): void {
    this._version = version
  }

  recordApplied(count = 1): void {
    this._applied += count
  }

  recordError(
    step: number,
    kind: StepErrorKind,
    error: unknown,
    positions: number[],
  ): void {
    const failure = getRemoteFailure(error)
    this._errors.push({
      step,
      kind,
      message: error instanceof Error ? error.message : String(error),
      positions,
      ...(failure ? { failure: failure.kind } : {}),
    })
  }

  recordConflict(
    step: number,
    expectedVersion: string,
    currentVersion: string | null,
  ): void {
    this._conflict = { atStep: step, expectedVersion, currentVersion }
  }

  /**
   * Marks every step from `from` onwards as skipped.
   */
  skipRemaining<S>(
    steps: readonly S[],
    from: number,
    reason: SkipReason,
    positionsOf: (step: S) => number[],
  ): void {
    for (let index = from; index < steps.length; index++) {
      this._skipped.push({
        step: index,
        reason,
        positions: positionsOf(steps[index]),
      })
    }
  }

  toOutcome(): ExecutionOutcome {
    return {
      applied: this._applied,
      errors: [...this._errors],
      skipped: [...this._skipped],
      conflict: this._conflict,
      finalVersion: this._version,
    }
  }
}
