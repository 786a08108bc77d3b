import type { Job } from 'bullmq'
import type { MDConfig } from './engine.js'
import type { Trajectory } from './trajectory.js'

export interface StateDefinition {
  name: string
  /** Python script printing one 1/0 per frame, see scriptCondition */
  script: string
}

export interface CommittorShotJobData {
  type: 'committor-shot'
  uuid: string
  workdir: string
  deffnm: string
  startingConfiguration: Trajectory
  trajOut: string
  overwrite?: boolean
  continuation?: boolean
  states: StateDefinition[]
  mdconfig: MDConfig
  outputTrajType?: string
  /** hours */
  walltimePerPart: number
  maxSteps?: number
  maxFrames?: number
}

export interface CommittorShotResult {
  uuid: string
  conditionIndex: number
  state: string
  trajOut: string
  frames: number
}

export type WorkerJob = CommittorShotJobData

// The part of a BullMQ job the committor pipeline reads and reports progress on.
export type CommittorShotJob = Pick<
  Job<CommittorShotJobData, CommittorShotResult>,
  'id' | 'name' | 'data' | 'updateProgress' | 'log'
>
