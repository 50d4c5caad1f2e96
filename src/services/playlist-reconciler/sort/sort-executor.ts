import type {
  ExecutionOutcome,
  SortMove,
} from '@root/types/reconcile.types.js'
import { getRemoteFailure } from '@utils/remote-errors.js'
import { guardStep } from '../concurrency/version-guard.js'
import type { RemoteDeps } from '../types.js'
import { ExecutionTracker } from '../utils/execution-tracker.js'

const movePositions = (move: SortMove): number[] => [move.originalPosition]

/**
 * Applies sort moves in the order they were planned. Each move is only
 * valid against the state every earlier move produced, so the first
 * failure or conflict ends the run.
 */
export async function executeSortMoves(
  deps: RemoteDeps,
  collectionId: string,
  moves: readonly SortMove[],
  initialVersion: string,
): Promise<ExecutionOutcome> {
  const { remote, executor, logger } = deps
  const tracker = new ExecutionTracker(initialVersion)

  for (const [index, move] of moves.entries()) {
    const guard = await guardStep(
      deps,
      collectionId,
      tracker,
      index,
      movePositions(move),
    )
    if (guard !== 'passed') {
      tracker.skipRemaining(
        moves,
        guard === 'conflict' ? index : index + 1,
        guard === 'conflict' ? 'version-conflict' : 'plan-invalidated',
        movePositions,
      )
      break
    }

    try {
      const version = await executor.execute(
        `move ${move.start} before ${move.insertBefore}`,
        () =>
          remote.reorderRange(
            collectionId,
            move.start,
            move.insertBefore,
            move.length,
          ),
      )
      tracker.recordMutation(version)
      tracker.recordApplied()
    } catch (error) {
      if (!getRemoteFailure(error)) throw error
      logger.error(
        { error },
        `Error moving track from ${move.start} to ${move.insertBefore}`,
      )
      tracker.recordError(index, 'api-error', error, movePositions(move))
      tracker.skipRemaining(
        moves,
        index + 1,
        'plan-invalidated',
        movePositions,
      )
      break
    }
  }

  return tracker.toOutcome()
}
