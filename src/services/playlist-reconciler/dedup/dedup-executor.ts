import type {
  DedupStep,
  ExecutionOutcome,
  RemoveAllReaddStep,
  RemoveAtStep,
} from '@root/types/reconcile.types.js'
import { getRemoteFailure, ReaddFailedError } from '@utils/remote-errors.js'
import { guardStep } from '../concurrency/version-guard.js'
import type { ExecutionDeps } from '../types.js'
import { ExecutionTracker } from '../utils/execution-tracker.js'

type StepResult = 'continue' | 'stop'

/** Snapshot positions a step is responsible for removing */
export function stepRemovalPositions(step: DedupStep): number[] {
  return step.kind === 'removeAt'
    ? [step.removal.position]
    : step.removals.map((removal) => removal.position)
}

async function executeRemoveAt(
  deps: ExecutionDeps,
  collectionId: string,
  step: RemoveAtStep,
  index: number,
  tracker: ExecutionTracker,
): Promise<StepResult> {
  const { remote, executor, logger } = deps
  const { identity, position } = step
  const positions = [step.removal.position]

  logger.info(
    `Removing "${step.removal.name}" (original position ${step.removal.position}, current position ${position})`,
  )

  try {
    if (deps.verifyPositions) {
      const found = await executor.execute(`read position ${position}`, () =>
        remote.itemAt(collectionId, position),
      )
      if (found === null) {
        logger.error(`No track found at position ${position}`)
        tracker.recordError(
          index,
          'position-not-found',
          `No track found at position ${position}`,
          positions,
        )
        return 'continue'
      }
      if (found !== identity) {
        const message = `Track mismatch at position ${position}. Expected ${identity}, found ${found}`
        logger.warn(message)
        tracker.recordError(index, 'identity-mismatch', message, positions)
        return 'continue'
      }
    }

    const version = await executor.execute(`remove position ${position}`, () =>
      remote.removeAt(collectionId, identity, [position]),
    )
    tracker.recordMutation(version)
    tracker.recordApplied()
    return 'continue'
  } catch (error) {
    if (!getRemoteFailure(error)) throw error
    logger.error({ error }, `Error executing step ${index + 1}`)
    tracker.recordError(index, 'api-error', error, positions)
    // Later unique removals sit at lower positions, so they stay valid
    return 'continue'
  }
}

async function executeRemoveAllReadd(
  deps: ExecutionDeps,
  collectionId: string,
  step: RemoveAllReaddStep,
  index: number,
  tracker: ExecutionTracker,
): Promise<StepResult> {
  const { remote, executor, logger } = deps
  const { identity } = step
  const positions = step.removals.map((removal) => removal.position)

  logger.info(
    `Removing all ${step.currentPositions.length} occurrences of ${identity} and re-adding at ${step.insertPositions.join(', ') || 'no positions'}`,
  )

  try {
    const version = await executor.execute(
      `remove all occurrences of ${identity}`,
      () => remote.removeAllOccurrences(collectionId, identity),
    )
    tracker.recordMutation(version)
  } catch (error) {
    if (!getRemoteFailure(error)) throw error
    logger.error({ error }, `Error executing step ${index + 1}`)
    tracker.recordError(index, 'api-error', error, positions)
    return 'stop'
  }

  // The identity is now absent remotely; a failure below loses it
  for (const position of step.insertPositions) {
    try {
      const version = await executor.execute(
        `re-add ${identity} at ${position}`,
        () => remote.insertAt(collectionId, identity, position),
      )
      tracker.recordMutation(version)
    } catch (error) {
      if (!getRemoteFailure(error)) throw error
      const readdError = new ReaddFailedError(identity, position, error)
      logger.error({ error: readdError }, readdError.message)
      tracker.recordError(index, 'readd-failed', readdError, positions)
      return 'stop'
    }
  }

  tracker.recordApplied(step.removals.length)
  return 'continue'
}

/**
 * Applies a dedup plan step by step, each gated by the version guard.
 *
 * Stops at the first version conflict, reporting every remaining step as
 * skipped. A failed position-specific removal is recorded and execution
 * goes on; any other failed step invalidates the positions the rest of the
 * plan was computed with, so the remainder is skipped.
 */
export async function executeDedupPlan(
  deps: ExecutionDeps,
  collectionId: string,
  steps: readonly DedupStep[],
  initialVersion: string,
): Promise<ExecutionOutcome> {
  const tracker = new ExecutionTracker(initialVersion)

  for (const [index, step] of steps.entries()) {
    deps.logger.debug(`Executing step ${index + 1}/${steps.length}`)

    const guard = await guardStep(
      deps,
      collectionId,
      tracker,
      index,
      stepRemovalPositions(step),
    )
    if (guard !== 'passed') {
      const from = guard === 'conflict' ? index : index + 1
      tracker.skipRemaining(
        steps,
        from,
        guard === 'conflict' ? 'version-conflict' : 'plan-invalidated',
        stepRemovalPositions,
      )
      break
    }

    const result =
      step.kind === 'removeAt'
        ? await executeRemoveAt(deps, collectionId, step, index, tracker)
        : await executeRemoveAllReadd(deps, collectionId, step, index, tracker)

    if (result === 'stop') {
      tracker.skipRemaining(
        steps,
        index + 1,
        'plan-invalidated',
        stepRemovalPositions,
      )
      break
    }
  }

  return tracker.toOutcome()
}
