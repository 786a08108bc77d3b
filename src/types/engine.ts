import type { Trajectory } from './trajectory.js'

/** Flat key/value MD parameter set, e.g. parsed from an .mdp or YAML file. */
export type MDConfig = Record<string, string | number | boolean>

export interface EngineOptions {
  mdconfig: MDConfig
  /** Overrides the engine class default */
  outputTrajType?: string
}

export interface MDEngine {
  readonly outputTrajType: string
  /** Integration steps done so far, including previous runs on continuation. */
  readonly stepsDone: number
  prepare(startingConfiguration: Trajectory, workdir: string, deffnm: string): Promise<void>
  prepareFromFiles(workdir: string, deffnm: string): Promise<void>
  /** Run for at most `walltime` hours and return the produced segment. */
  runWalltime(walltime: number): Promise<Trajectory>
  /** Re-open a segment this engine wrote earlier. */
  openSegment(trajectoryFile: string, deffnm: string): Promise<Trajectory>
}

export interface MDEngineClass<O extends EngineOptions = EngineOptions> {
  new (options: O): MDEngine
  readonly outputTrajType: string
}
