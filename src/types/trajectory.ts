// Immutable handle to an on-disk trajectory: one or more container files plus
// the structure (topology) file needed to read them.
export interface Trajectory {
  readonly trajectoryFiles: readonly string[]
  readonly structureFile: string
  /** Number of frames */
  readonly length: number
}

export type Stride = 1 | -1

/**
 * One read instruction of a slice plan.
 *
 * Half-open slice semantics over the segment's frames: `start` is inclusive,
 * `stop` exclusive, `null` meaning "run off the end" in the read direction.
 * A negative stride is a time-reversed read, i.e. the concatenator has to
 * invert momenta on those frames.
 */
export interface SegmentSlice {
  segment: Trajectory
  start: number
  stop: number | null
  stride: Stride
}

export type SlicePlan = SegmentSlice[]

/** Position of the first frame on which any condition holds. */
export interface FrameAddress {
  conditionIndex: number
  globalFrame: number
  segmentIndex: number
  localFrame: number
}

/** (conditions x frames) for a single segment */
export type ConditionMatrix = boolean[][]

export interface PropagationResult {
  segments: Trajectory[]
  conditionIndex: number
}

export interface ConcatenationResult {
  trajectory: Trajectory
  conditionIndex: number
}

export const trajectoryKey = (traj: Trajectory): string =>
  `${traj.structureFile}::${traj.trajectoryFiles.join('|')}`
