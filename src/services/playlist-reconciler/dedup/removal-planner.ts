import type {
  DuplicateGroup,
  MutationOp,
  Snapshot,
} from '@root/types/collection.types.js'
import type {
  DedupPlan,
  DedupStep,
  RemovalCandidate,
  RemoveAllReaddStep,
} from '@root/types/reconcile.types.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  applyOp,
  applyOps,
  findPositions,
  identityToken,
} from '../simulation/simulated-collection.js'
import {
  classifyRemovals,
  collectRemovalCandidates,
  countIdentities,
} from './duplicate-detector.js'

type IdentitySequence = (string | null)[]

/**
 * Expands a planned step into the remote mutations it issues, in order.
 */
export function stepOps(step: DedupStep): MutationOp[] {
  if (step.kind === 'removeAt') {
    return [
      { type: 'removeAt', identity: step.identity, positions: [step.position] },
    ]
  }
  return [
    { type: 'removeAllOccurrences', identity: step.identity },
    ...step.insertPositions.map(
      (position): MutationOp => ({
        type: 'insertAt',
        identity: step.identity,
        position,
      }),
    ),
  ]
}

/**
 * Plans the batch for an identity that occurs more than once: remove every
 * occurrence, then re-insert the retained ones where they belong.
 *
 * Nothing before this step touches the identity, so its simulated
 * occurrences line up one-to-one, in order, with its snapshot occurrences.
 */
function planSharedIdentity(
  simulation: IdentitySequence,
  identity: string,
  removals: RemovalCandidate[],
  snapshotPositions: number[],
): RemoveAllReaddStep | string {
  const currentPositions = findPositions(simulation, identity)
  if (currentPositions.length === 0) {
    return `Identity ${identity} not found in simulation - skipping`
  }
  if (currentPositions.length !== snapshotPositions.length) {
    return `Identity ${identity} occurs ${currentPositions.length} times in simulation but ${snapshotPositions.length} times in snapshot - skipping`
  }

  const doomedSnapshot = new Set(removals.map((removal) => removal.position))
  const doomedSimulated = new Set(
    currentPositions.filter((_, ordinal) =>
      doomedSnapshot.has(snapshotPositions[ordinal]),
    ),
  )
  const expected = simulation.filter((_, index) => !doomedSimulated.has(index))

  return {
    kind: 'removeAllReadd',
    identity,
    currentPositions,
    insertPositions: findPositions(expected, identity),
    removals,
  }
}

/**
 * Computes the dedup plan for a snapshot.
 *
 * Shared-identity batches run first, then unique-identity removals from the
 * bottom of the collection up. Every step is applied to a simulation of the
 * collection, and the simulated position is what the step sends remotely.
 */
export function planDedup(
  snapshot: Snapshot,
  groups: readonly DuplicateGroup[],
  log?: FastifyBaseLogger,
): DedupPlan {
  const identityCounts = countIdentities(snapshot.items)
  const candidates = collectRemovalCandidates(groups)
  const { unique, shared } = classifyRemovals(candidates, identityCounts)

  const steps: DedupStep[] = []
  const warnings: string[] = []
  let simulation: IdentitySequence = snapshot.items.map((item) => item.identity)

  const warn = (message: string) => {
    warnings.push(message)
    log?.warn(message)
  }

  for (const [identity, removals] of shared) {
    const snapshotPositions = snapshot.items
      .filter((item) => item.identity === identity)
      .map((item) => item.position)

    const step = planSharedIdentity(
      simulation,
      identity,
      removals,
      snapshotPositions,
    )
    if (typeof step === 'string') {
      warn(step)
      continue
    }

    log?.debug(
      `Planned remove-all + re-add for ${identity}: positions ${step.currentPositions.join(', ')} -> re-add at ${step.insertPositions.join(', ') || 'none'}`,
    )
    steps.push(step)
    simulation = applyOps(simulation, stepOps(step), identityToken)
  }

  for (const removal of unique) {
    const positions = findPositions(simulation, removal.identity)
    if (positions.length === 0) {
      warn(`Identity ${removal.identity} not found in simulation - skipping`)
      continue
    }

    const position = positions[0]
    steps.push({
      kind: 'removeAt',
      identity: removal.identity,
      position,
      removal,
    })
    simulation = applyOp(
      simulation,
      { type: 'removeAt', identity: removal.identity, positions: [position] },
      identityToken,
    )
  }

  const sharedIdentityRemovals: Record<string, RemovalCandidate[]> = {}
  for (const [identity, removals] of shared) {
    sharedIdentityRemovals[identity] = removals
  }

  return {
    steps,
    uniqueIdentityRemovals: unique,
    sharedIdentityRemovals,
    predictedOrder: simulation,
    warnings,
  }
}
