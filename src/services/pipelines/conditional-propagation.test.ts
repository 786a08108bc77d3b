import { vi, describe, it, expect, beforeEach } from 'vitest'
import { logger } from '../../helpers/loggers.js'
import { ProcessLimiter } from '../../helpers/limiter.js'
import type { EngineOptions, MDEngine } from '../../types/engine.js'
import type { Trajectory } from '../../types/trajectory.js'
import { suspendingCondition } from '../functions/condition-functions.js'
import type { TrajectoryCondition } from '../functions/condition-functions.js'
import {
  NoConditionFulfilledError,
  StepBudgetExceededError
} from '../functions/errors.js'
import { slicePlanLength } from '../functions/slice-plan.js'
import { StitchingExecutor } from '../functions/stitching-functions.js'
import type {
  ConcatenationRequest,
  TrajectoryConcatenator
} from '../functions/stitching-functions.js'
import { ConditionalTrajectoryPropagator } from './conditional-propagation.js'
import type { PropagatorOptions } from './conditional-propagation.js'

// file -> condition index -> frames on which that condition holds
type Truths = Record<string, Record<number, number[]>>

interface FakeEngineOptions extends EngineOptions {
  framesPerPart: number
  stepsPerPart: number
  events: string[]
  /** Parts already on disk, seen by prepareFromFiles */
  existingParts?: number
}

const traj = (file: string, length: number): Trajectory => ({
  trajectoryFiles: [file],
  structureFile: 'conf.gro',
  length
})

class FakeEngine implements MDEngine {
  static readonly outputTrajType = 'xtc'
  readonly outputTrajType = 'xtc'
  stepsDone = 0
  private part = 0
  private deffnm = ''

  constructor(private readonly options: FakeEngineOptions) {}

  async prepare(_start: Trajectory, _workdir: string, deffnm: string): Promise<void> {
    this.options.events.push('prepare')
    this.deffnm = deffnm
  }

  async prepareFromFiles(_workdir: string, deffnm: string): Promise<void> {
    this.options.events.push('prepareFromFiles')
    this.deffnm = deffnm
    this.part = this.options.existingParts ?? 0
    this.stepsDone = this.part * this.options.stepsPerPart
  }

  async runWalltime(walltime: number): Promise<Trajectory> {
    this.part++
    this.options.events.push(`run ${this.part} (${walltime}h)`)
    this.stepsDone += this.options.stepsPerPart
    return traj(`${this.deffnm}.part${this.part}.xtc`, this.options.framesPerPart)
  }

  async openSegment(trajectoryFile: string): Promise<Trajectory> {
    return traj(trajectoryFile, this.options.framesPerPart)
  }
}

const conditionsFor = (truths: Truths, count = 2): TrajectoryCondition[] =>
  Array.from({ length: count }, (_, idx) =>
    suspendingCondition(`state${idx}`, async (t) => {
      const frames = truths[t.trajectoryFiles[0]]?.[idx] ?? []
      return Array.from({ length: t.length }, (_, f) => frames.includes(f))
    })
  )

class RecordingConcatenator implements TrajectoryConcatenator {
  requests: ConcatenationRequest[] = []

  async concatenate(request: ConcatenationRequest): Promise<Trajectory> {
    this.requests.push(request)
    return {
      trajectoryFiles: [request.trajOut],
      structureFile: request.structOut ?? request.plan[0].segment.structureFile,
      length: slicePlanLength(request.plan)
    }
  }
}

const start = traj('start.gro', 1)
const trajOut = '/nonexistent/segmd-test/out.xtc'

let events: string[]
let concatenator: RecordingConcatenator

const makePropagator = (
  truths: Truths,
  overrides: Partial<PropagatorOptions<FakeEngineOptions>> = {}
) =>
  new ConditionalTrajectoryPropagator<FakeEngineOptions>({
    conditions: conditionsFor(truths),
    engineClass: FakeEngine,
    engineOptions: { mdconfig: {}, framesPerPart: 10, stepsPerPart: 100, events },
    walltimePerPart: 0.25,
    maxSteps: 1_000,
    stitcher: new StitchingExecutor(concatenator, new ProcessLimiter(1)),
    ...overrides
  })

beforeEach(() => {
  vi.clearAllMocks()
  events = []
  concatenator = new RecordingConcatenator()
})

describe('ConditionalTrajectoryPropagator.propagate', () => {
  it('runs segments until a condition holds', async () => {
    const propagator = makePropagator({ 'shot.part3.xtc': { 1: [4] } })

    const result = await propagator.propagate(start, '/work', 'shot')

    expect(result.conditionIndex).toBe(1)
    expect(result.segments.map((s) => s.trajectoryFiles[0])).toEqual([
      'shot.part1.xtc',
      'shot.part2.xtc',
      'shot.part3.xtc'
    ])
    expect(events).toEqual(['prepare', 'run 1 (0.25h)', 'run 2 (0.25h)', 'run 3 (0.25h)'])
  })

  it('stops once the step budget is passed', async () => {
    const propagator = makePropagator({}, { maxSteps: 250 })

    const error = await propagator.propagate(start, '/work', 'shot').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(StepBudgetExceededError)
    expect(error).toMatchObject({
      stepsDone: 300,
      maxSteps: 250,
      message: 'Engine produced 300 steps (>= 250).'
    })
    expect(events).toHaveLength(4)
  })

  it('reports a condition reached in the segment that passes the budget', async () => {
    const propagator = makePropagator({ 'shot.part3.xtc': { 0: [9] } }, { maxSteps: 250 })
    await expect(propagator.propagate(start, '/work', 'shot')).resolves.toMatchObject({
      conditionIndex: 0
    })
  })

  it('returns the starting configuration when it is already in a state', async () => {
    const propagator = makePropagator({ 'start.gro': { 1: [0] } })

    const result = await propagator.propagate(start, '/work', 'shot')

    expect(result).toEqual({ segments: [start], conditionIndex: 1 })
    expect(events).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith(
      'Starting configuration of shot already fulfills condition 1 (state1).'
    )
  })

  it('returns existing segments on continuation when they already reach a state', async () => {
    const existing = [traj('shot.part1.xtc', 10), traj('shot.part2.xtc', 10)]
    const listSegments = vi.fn(
      async (_folder: string, _deffnm: string, _engine: MDEngine) => existing
    )
    const propagator = makePropagator({ 'shot.part2.xtc': { 0: [2] } }, { listSegments })

    const result = await propagator.propagate(start, '/work', 'shot', true)

    expect(result).toEqual({ segments: existing, conditionIndex: 0 })
    expect(listSegments).toHaveBeenCalledWith('/work', 'shot', expect.any(FakeEngine))
    expect(events).toEqual([])
  })

  it('continues after the existing segments otherwise', async () => {
    const existing = [traj('shot.part1.xtc', 10), traj('shot.part2.xtc', 10)]
    const propagator = makePropagator(
      { 'shot.part3.xtc': { 0: [0] } },
      {
        listSegments: async () => [...existing],
        engineOptions: {
          mdconfig: {},
          framesPerPart: 10,
          stepsPerPart: 100,
          events,
          existingParts: 2
        }
      }
    )

    const result = await propagator.propagate(start, '/work', 'shot', true)

    expect(result.segments).toHaveLength(3)
    expect(result.segments[2].trajectoryFiles).toEqual(['shot.part3.xtc'])
    expect(events).toEqual(['prepareFromFiles', 'run 3 (0.25h)'])
  })

  it('counts steps of earlier runs against the budget on continuation', async () => {
    const propagator = makePropagator(
      {},
      {
        maxSteps: 150,
        listSegments: async () => [traj('shot.part1.xtc', 10), traj('shot.part2.xtc', 10)],
        engineOptions: {
          mdconfig: {},
          framesPerPart: 10,
          stepsPerPart: 100,
          events,
          existingParts: 2
        }
      }
    )

    await expect(propagator.propagate(start, '/work', 'shot', true)).rejects.toMatchObject({
      stepsDone: 200,
      maxSteps: 150
    })
    expect(events).toEqual(['prepareFromFiles'])
  })

  it('reports the lowest condition index when several hold on the same frame', async () => {
    const propagator = makePropagator({ 'shot.part1.xtc': { 0: [5], 1: [3, 5] } })
    await expect(propagator.propagate(start, '/work', 'shot')).resolves.toMatchObject({
      conditionIndex: 1
    })

    const tie = makePropagator({ 'shot.part1.xtc': { 0: [5], 1: [5] } })
    await expect(tie.propagate(start, '/work', 'shot')).resolves.toMatchObject({
      conditionIndex: 0
    })
  })

  it('passes condition errors through unchanged', async () => {
    const boom = new Error('analysis crashed')
    const propagator = makePropagator(
      {},
      { conditions: [suspendingCondition('broken', () => Promise.reject(boom))] }
    )
    await expect(propagator.propagate(start, '/work', 'shot')).rejects.toBe(boom)
  })
})

describe('ConditionalTrajectoryPropagator step budget', () => {
  it('converts maxFrames with the output interval of the trajectory type', () => {
    const propagator = makePropagator(
      {},
      {
        maxSteps: undefined,
        maxFrames: 4,
        engineOptions: {
          mdconfig: { 'nstxout-compressed': 50, nstxout: 10 },
          framesPerPart: 10,
          stepsPerPart: 100,
          events
        }
      }
    )
    expect(propagator.maxSteps).toBe(200)
  })

  it('prefers maxSteps over maxFrames', () => {
    const propagator = makePropagator({}, { maxSteps: 30, maxFrames: 4 })
    expect(propagator.maxSteps).toBe(30)
    expect(logger.warn).toHaveBeenCalledWith(
      'Both maxSteps and maxFrames given. maxSteps takes precedence.'
    )
  })

  it('has no budget when neither is given', () => {
    expect(makePropagator({}, { maxSteps: undefined }).maxSteps).toBe(Number.POSITIVE_INFINITY)
  })

  it('rejects empty conditions and non-positive walltimes', () => {
    expect(() => makePropagator({}, { conditions: [] })).toThrow(
      'At least one condition is required'
    )
    expect(() => makePropagator({}, { walltimePerPart: 0 })).toThrow(RangeError)
  })
})

describe('ConditionalTrajectoryPropagator.cutAndConcatenate', () => {
  it('cuts after the first frame in a state', async () => {
    const segments = [traj('a.xtc', 3), traj('b.xtc', 5)]
    const propagator = makePropagator({ 'b.xtc': { 0: [3, 4] } })

    const result = await propagator.cutAndConcatenate(segments, trajOut)

    expect(result.conditionIndex).toBe(0)
    expect(result.trajectory).toEqual({
      trajectoryFiles: [trajOut],
      structureFile: 'conf.gro',
      length: 7
    })
    expect(concatenator.requests).toEqual([
      {
        plan: [
          { segment: segments[0], start: 0, stop: null, stride: 1 },
          { segment: segments[1], start: 0, stop: 4, stride: 1 }
        ],
        trajOut,
        structOut: null,
        overwrite: false
      }
    ])
  })

  it('fails when no segment reaches a state', async () => {
    const propagator = makePropagator({})
    await expect(
      propagator.cutAndConcatenate([traj('a.xtc', 3)], trajOut)
    ).rejects.toBeInstanceOf(NoConditionFulfilledError)
    expect(concatenator.requests).toEqual([])
  })

  it('propagates and concatenates in one call', async () => {
    const propagator = makePropagator({ 'shot.part2.xtc': { 1: [6] } })

    const result = await propagator.propagateAndConcatenate(start, '/work', 'shot', trajOut)

    // one full part plus frames 0..6 of the second
    expect(result).toEqual({
      trajectory: { trajectoryFiles: [trajOut], structureFile: 'conf.gro', length: 17 },
      conditionIndex: 1
    })
  })
})
