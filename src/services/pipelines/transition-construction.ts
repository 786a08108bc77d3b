import { logger } from '../../helpers/loggers.js'
import type { FrameAddress, Trajectory } from '../../types/trajectory.js'
import { evaluateCondition } from '../functions/condition-functions.js'
import type { TrajectoryCondition } from '../functions/condition-functions.js'
import { NoConditionFulfilledError } from '../functions/errors.js'
import { locateFirstTrueFrameOfVectors } from '../functions/frame-locator.js'
import { buildTransitionSlicePlan } from '../functions/slice-plan.js'
import type { StitchingExecutor } from '../functions/stitching-functions.js'

export interface TransitionFromChains {
  /** Segments propagated backward in time, inverted when stitched */
  minusSegments: Trajectory[]
  /** Index into stateConditions of the state reached by the minus chain */
  minusState: number
  /** Segments propagated forward in time, taken as they are */
  plusSegments: Trajectory[]
  plusState: number
  stateConditions: readonly TrajectoryCondition[]
  trajOut: string
  /** null: structure file of the minus segment that opens the path */
  structOut?: string | null
  overwrite?: boolean
  stitcher: StitchingExecutor
}

const locateStateOnChain = async (
  segments: Trajectory[],
  stateConditions: readonly TrajectoryCondition[],
  state: number,
  side: string
): Promise<FrameAddress> => {
  const condition = stateConditions[state]
  if (!condition) {
    throw new RangeError(`${side}: no state condition with index ${state}`)
  }
  const values = await Promise.all(segments.map((s) => evaluateCondition(condition, s, state)))
  const address = locateFirstTrueFrameOfVectors(values, state)
  if (!address) {
    throw new NoConditionFulfilledError(`the ${side} chain (state ${condition.name})`)
  }
  return address
}

/**
 * Build one continuous transition path from a backward and a forward chain of
 * segments that share their starting configuration, e.g. the two halves of a
 * two-way shooting move or a committor shot pair. Momenta on the minus part
 * are inverted by the concatenator.
 */
export const constructTransitionFromSegmentChains = async ({
  minusSegments,
  minusState,
  plusSegments,
  plusState,
  stateConditions,
  trajOut,
  structOut = null,
  overwrite = false,
  stitcher
}: TransitionFromChains): Promise<Trajectory> => {
  const [minusAddress, plusAddress] = await Promise.all([
    locateStateOnChain(minusSegments, stateConditions, minusState, 'minus'),
    locateStateOnChain(plusSegments, stateConditions, plusState, 'plus')
  ])
  const plan = buildTransitionSlicePlan(minusSegments, minusAddress, plusSegments, plusAddress)
  logger.info(
    `Transition ${trajOut}: minus reaches state ${minusState} at part ${minusAddress.segmentIndex} ` +
      `frame ${minusAddress.localFrame}, plus reaches state ${plusState} at part ` +
      `${plusAddress.segmentIndex} frame ${plusAddress.localFrame}`
  )
  return stitcher.stitch(plan, trajOut, structOut, overwrite)
}
