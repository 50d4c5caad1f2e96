import type { MutationOp } from '@root/types/collection.types.js'

/**
 * The planner's belief about the remote collection: an ordered sequence of
 * tokens. Dedup planning simulates identities; sort planning simulates
 * snapshot positions, which are unique.
 */
export type SimulatedCollection<T> = readonly T[]

/**
 * Returns the collection that results from applying `op`. Never mutates
 * its input.
 *
 * Semantics follow the remote API:
 * - `removeAt` drops the listed positions (out-of-range ones are ignored)
 * - `removeAllOccurrences` drops every entry equal to the identity
 * - `insertAt` clamps the position to the collection bounds
 * - `reorderRange` takes `length` entries starting at `start` and inserts
 *   them before the entry that was at `insertBefore` prior to the move
 *
 * @param toToken - Maps an identity to the token type carried by the collection
 */
export function applyOp<T>(
  state: SimulatedCollection<T>,
  op: MutationOp,
  toToken: (identity: string) => T,
): T[] {
  switch (op.type) {
    case 'removeAt': {
      const doomed = new Set(op.positions)
      return state.filter((_, index) => !doomed.has(index))
    }
    case 'removeAllOccurrences': {
      const token = toToken(op.identity)
      return state.filter((entry) => entry !== token)
    }
    case 'insertAt': {
      const next = [...state]
      const position = Math.max(0, Math.min(op.position, next.length))
      next.splice(position, 0, toToken(op.identity))
      return next
    }
    case 'reorderRange':
      return moveRange(state, op.start, op.insertBefore, op.length)
  }
}

function moveRange<T>(
  state: SimulatedCollection<T>,
  start: number,
  insertBefore: number,
  length: number,
): T[] {
  if (
    length <= 0 ||
    start < 0 ||
    start + length > state.length ||
    insertBefore < 0 ||
    insertBefore > state.length
  ) {
    throw new RangeError(
      `Invalid reorder: start=${start} insertBefore=${insertBefore} length=${length} size=${state.length}`,
    )
  }

  // Inserting inside the moved range leaves the order unchanged
  if (insertBefore >= start && insertBefore <= start + length) {
    return [...state]
  }

  const next = [...state]
  const moved = next.splice(start, length)
  const target = insertBefore > start ? insertBefore - length : insertBefore
  next.splice(target, 0, ...moved)
  return next
}

/**
 * Applies a sequence of ops in order.
 */
export function applyOps<T>(
  state: SimulatedCollection<T>,
  ops: readonly MutationOp[],
  toToken: (identity: string) => T,
): T[] {
  let current: T[] = [...state]
  for (const op of ops) {
    current = applyOp(current, op, toToken)
  }
  return current
}

/**
 * Positions at which `token` currently occurs, ascending.
 */
export function findPositions<T>(
  state: SimulatedCollection<T>,
  token: T,
): number[] {
  const positions: number[] = []
  state.forEach((entry, index) => {
    if (entry === token) positions.push(index)
  })
  return positions
}

/** Identity collections carry identities as tokens */
export const identityToken = (identity: string): string | null => identity

/**
 * Token mapper for collections that only ever see reorders, such as the
 * position sequences the sort planner simulates.
 */
export function rejectIdentityOps(identity: string): never {
  throw new TypeError(
    `Identity op for ${identity} applied to a position-only simulation`,
  )
}
