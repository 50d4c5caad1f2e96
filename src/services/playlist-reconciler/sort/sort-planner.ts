import type {
  CollectionItem,
  ReorderRangeOp,
  Snapshot,
} from '@root/types/collection.types.js'
import type { SortMove, SortPlan } from '@root/types/reconcile.types.js'
import {
  applyOp,
  rejectIdentityOps,
} from '../simulation/simulated-collection.js'

/**
 * Orders items by release date. `Array.prototype.sort` is stable, so items
 * sharing a date keep their relative order in both directions. Items
 * without a date go last, in their original order.
 */
export function sortByReleaseDate(
  items: readonly CollectionItem[],
  descending: boolean,
): CollectionItem[] {
  const dated = items.filter((item) => item.sortKey !== null)
  const undated = items.filter((item) => item.sortKey === null)

  dated.sort((a, b) => {
    const left = a.sortKey ?? ''
    const right = b.sortKey ?? ''
    if (left === right) return 0
    const ascending = left < right ? -1 : 1
    return descending ? -ascending : ascending
  })

  return [...dated, ...undated]
}

/**
 * `permutation[originalPosition]` is the position the item must end at.
 */
export function computePermutation(targetOrder: readonly number[]): number[] {
  const permutation = new Array<number>(targetOrder.length)
  targetOrder.forEach((originalPosition, targetPosition) => {
    permutation[originalPosition] = targetPosition
  })
  return permutation
}

/**
 * Computes the single-item moves that turn the snapshot order into
 * release-date order.
 *
 * Target slots are filled left to right. Everything left of the current
 * slot is already final, so the item for the slot always sits at or to the
 * right of it and moves with `insertBefore` equal to the slot. Each move is
 * applied to a simulation of the collection because it shifts every item
 * between its source and destination.
 */
export function planSort(snapshot: Snapshot, descending: boolean): SortPlan {
  const targetOrder = sortByReleaseDate(snapshot.items, descending).map(
    (item) => item.position,
  )
  const permutation = computePermutation(targetOrder)

  const moves: SortMove[] = []
  let simulation: number[] = snapshot.items.map((item) => item.position)

  for (let targetPosition = 0; targetPosition < targetOrder.length; targetPosition++) {
    const originalPosition = targetOrder[targetPosition]
    const currentPosition = simulation.indexOf(originalPosition)
    if (currentPosition === targetPosition) continue

    const op: ReorderRangeOp = {
      type: 'reorderRange',
      start: currentPosition,
      insertBefore: targetPosition,
      length: 1,
    }
    moves.push({
      start: op.start,
      insertBefore: op.insertBefore,
      length: op.length,
      originalPosition,
      name: snapshot.items[originalPosition].name,
    })
    simulation = applyOp(simulation, op, rejectIdentityOps)
  }

  return { moves, targetOrder, permutation }
}

/**
 * Replays moves against an order, returning the resulting order.
 */
export function replayMoves(
  order: readonly number[],
  moves: readonly SortMove[],
): number[] {
  let current = [...order]
  for (const move of moves) {
    current = applyOp(
      current,
      {
        type: 'reorderRange',
        start: move.start,
        insertBefore: move.insertBefore,
        length: move.length,
      },
      rejectIdentityOps,
    )
  }
  return current
}
