import { logger } from '../../helpers/loggers.js'
import { nstoutFromMdconfig } from '../../helpers/mdconfig.js'
import type { EngineOptions, MDEngineClass } from '../../types/engine.js'
import type {
  ConcatenationResult,
  ConditionMatrix,
  PropagationResult,
  Trajectory
} from '../../types/trajectory.js'
import {
  evaluateConditions,
  warnAboutBlockingConditions
} from '../functions/condition-functions.js'
import type { TrajectoryCondition } from '../functions/condition-functions.js'
import { NoConditionFulfilledError, StepBudgetExceededError } from '../functions/errors.js'
import { locateFirstTrueFrame } from '../functions/frame-locator.js'
import { listExistingSegments } from '../functions/segment-discovery.js'
import type { SegmentLister } from '../functions/segment-discovery.js'
import { buildForwardSlicePlan } from '../functions/slice-plan.js'
import type { StitchingExecutor } from '../functions/stitching-functions.js'

export interface PropagatorOptions<O extends EngineOptions> {
  conditions: TrajectoryCondition[]
  engineClass: MDEngineClass<O>
  engineOptions: O
  /** Walltime per segment, in hours */
  walltimePerPart: number
  /** Takes precedence over maxFrames */
  maxSteps?: number
  maxFrames?: number
  stitcher: StitchingExecutor
  listSegments?: SegmentLister
}

const resolveMaxSteps = <O extends EngineOptions>(opts: PropagatorOptions<O>): number => {
  const { maxSteps, maxFrames, engineClass, engineOptions } = opts
  if (maxSteps !== undefined && maxFrames !== undefined) {
    logger.warn('Both maxSteps and maxFrames given. maxSteps takes precedence.')
  }
  if (maxSteps !== undefined) return maxSteps
  if (maxFrames !== undefined) {
    const trajType = engineOptions.outputTrajType ?? engineClass.outputTrajType
    return maxFrames * nstoutFromMdconfig(engineOptions.mdconfig, trajType)
  }
  logger.info('Neither maxSteps nor maxFrames given, propagating without a step budget.')
  return Number.POSITIVE_INFINITY
}

/**
 * Propagates a trajectory in segments of `walltimePerPart` hours until any of
 * `conditions` is true on a produced frame.
 *
 * Conditions are assumed to be mutually exclusive per frame; this is not
 * checked. If several hold on the same frame the lowest index is reported.
 */
export class ConditionalTrajectoryPropagator<O extends EngineOptions = EngineOptions> {
  readonly conditions: readonly TrajectoryCondition[]
  readonly maxSteps: number
  readonly walltimePerPart: number
  private readonly engineClass: MDEngineClass<O>
  private readonly engineOptions: O
  private readonly stitcher: StitchingExecutor
  private readonly listSegments: SegmentLister

  constructor(opts: PropagatorOptions<O>) {
    if (opts.conditions.length === 0) {
      throw new Error('At least one condition is required')
    }
    if (!(opts.walltimePerPart > 0)) {
      throw new RangeError(`walltimePerPart must be positive, got ${opts.walltimePerPart}`)
    }
    warnAboutBlockingConditions(opts.conditions)
    this.conditions = [...opts.conditions]
    this.engineClass = opts.engineClass
    this.engineOptions = opts.engineOptions
    this.walltimePerPart = opts.walltimePerPart
    this.stitcher = opts.stitcher
    this.listSegments = opts.listSegments ?? listExistingSegments
    this.maxSteps = resolveMaxSteps(opts)
  }

  /**
   * Propagate until any condition is fulfilled.
   *
   * @returns the segments, the last one holding the first frame in a state,
   * and the index of that condition
   * @throws StepBudgetExceededError when maxSteps is passed first
   */
  async propagate(
    startingConfiguration: Trajectory,
    workdir: string,
    deffnm: string,
    continuation = false
  ): Promise<PropagationResult> {
    const startVals = await evaluateConditions(this.conditions, startingConfiguration)
    const atStart = locateFirstTrueFrame([startVals])
    if (atStart) {
      logger.warn(
        `Starting configuration of ${deffnm} already fulfills condition ` +
          `${atStart.conditionIndex} (${this.conditions[atStart.conditionIndex].name}).`
      )
      return { segments: [startingConfiguration], conditionIndex: atStart.conditionIndex }
    }

    const engine = new this.engineClass(this.engineOptions)
    let segments: Trajectory[]
    let stepCounter: number
    if (!continuation) {
      await engine.prepare(startingConfiguration, workdir, deffnm)
      segments = []
      stepCounter = 0
    } else {
      // conditions may have changed since the last run, so re-evaluate all parts
      segments = await this.listSegments(workdir, deffnm, engine)
      const existing = await Promise.all(
        segments.map((s) => evaluateConditions(this.conditions, s))
      )
      const found = locateFirstTrueFrame(existing)
      if (found) {
        logger.info(
          `${deffnm} already reached condition ${found.conditionIndex} in part ${found.segmentIndex}`
        )
        return { segments, conditionIndex: found.conditionIndex }
      }
      await engine.prepareFromFiles(workdir, deffnm)
      stepCounter = engine.stepsDone
    }

    let lastVals: ConditionMatrix | null = null
    let met = false
    while (!met && stepCounter <= this.maxSteps) {
      const segment = await engine.runWalltime(this.walltimePerPart)
      lastVals = await evaluateConditions(this.conditions, segment)
      met = lastVals.some((row) => row.some(Boolean))
      stepCounter = engine.stepsDone
      segments.push(segment)
      logger.debug(`${deffnm}: part ${segments.length} done, ${stepCounter} steps`)
    }

    const found = lastVals ? locateFirstTrueFrame([lastVals]) : null
    if (!found) {
      throw new StepBudgetExceededError(stepCounter, this.maxSteps)
    }
    logger.info(
      `${deffnm} reached condition ${found.conditionIndex} after ${segments.length} parts`
    )
    return { segments, conditionIndex: found.conditionIndex }
  }

  /**
   * Cut and concatenate `segments` into one trajectory ending on the first
   * frame that fulfills any condition. Frame 0 of the first segment must not
   * fulfill a condition unless it is the only frame taken.
   */
  async cutAndConcatenate(
    segments: Trajectory[],
    trajOut: string,
    overwrite = false
  ): Promise<ConcatenationResult> {
    // condition wrappers usually cache, so this is cheap after propagate()
    const matrices = await Promise.all(
      segments.map((s) => evaluateConditions(this.conditions, s))
    )
    const address = locateFirstTrueFrame(matrices)
    if (!address) {
      throw new NoConditionFulfilledError(`${segments.length} segments for ${trajOut}`)
    }
    const plan = buildForwardSlicePlan(segments, address)
    // the structure file comes from the engine segments
    const trajectory = await this.stitcher.stitch(plan, trajOut, null, overwrite)
    return { trajectory, conditionIndex: address.conditionIndex }
  }

  async propagateAndConcatenate(
    startingConfiguration: Trajectory,
    workdir: string,
    deffnm: string,
    trajOut: string,
    overwrite = false,
    continuation = false
  ): Promise<ConcatenationResult> {
    const { segments } = await this.propagate(
      startingConfiguration,
      workdir,
      deffnm,
      continuation
    )
    return this.cutAndConcatenate(segments, trajOut, overwrite)
  }
}
