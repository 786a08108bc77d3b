import path from 'path'
import fs from 'fs-extra'
import YAML from 'yaml'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { runPythonStep, describeExit } from '../../helpers/runPythonStep.js'
import type { EngineOptions, MDEngine } from '../../types/engine.js'
import type { Trajectory } from '../../types/trajectory.js'
import { segmentFileName } from './segment-discovery.js'

export interface OpenMMEngineOptions extends EngineOptions {
  /** Segment script, defaults to OPENMM_SEGMENT_SCRIPT */
  scriptPath?: string
  pythonBin?: string
  platform?: 'CUDA' | 'OpenCL' | 'CPU'
  pluginDir?: string
  timeoutMs?: number
}

interface PartRecord {
  file: string
  n_frames: number
}

// Progress file the segment script rewrites after every part.
interface EngineState {
  steps_done: number
  parts: PartRecord[]
}

const configFileName = (deffnm: string) => `${deffnm}_openmm.yaml`
const stateFileName = (deffnm: string) => `${deffnm}_state.yaml`

const parsePartRecord = (raw: unknown): PartRecord => {
  if (
    typeof raw === 'object' &&
    raw !== null &&
    'file' in raw &&
    typeof raw.file === 'string' &&
    'n_frames' in raw &&
    typeof raw.n_frames === 'number'
  ) {
    return { file: raw.file, n_frames: raw.n_frames }
  }
  throw new Error(`Malformed part record in engine state: ${JSON.stringify(raw)}`)
}

const parseEngineState = (raw: unknown): EngineState => {
  if (
    typeof raw === 'object' &&
    raw !== null &&
    'steps_done' in raw &&
    typeof raw.steps_done === 'number' &&
    'parts' in raw &&
    Array.isArray(raw.parts)
  ) {
    return { steps_done: raw.steps_done, parts: raw.parts.map(parsePartRecord) }
  }
  throw new Error('Malformed engine state, expected steps_done and parts')
}

const parseStructureFile = (raw: unknown): string => {
  if (
    typeof raw === 'object' &&
    raw !== null &&
    'starting_configuration' in raw &&
    typeof raw.starting_configuration === 'object' &&
    raw.starting_configuration !== null &&
    'structure_file' in raw.starting_configuration &&
    typeof raw.starting_configuration.structure_file === 'string'
  ) {
    return raw.starting_configuration.structure_file
  }
  throw new Error('Engine config has no starting_configuration.structure_file')
}

const readStructureFile = async (workdir: string, deffnm: string): Promise<string> => {
  const configPath = path.join(workdir, configFileName(deffnm))
  if (!(await fs.pathExists(configPath))) {
    throw new Error(`No engine config for ${deffnm}: ${configPath} does not exist`)
  }
  return parseStructureFile(YAML.parse(await fs.readFile(configPath, 'utf8')))
}

const readState = async (workdir: string, deffnm: string): Promise<EngineState> => {
  const statePath = path.join(workdir, stateFileName(deffnm))
  if (!(await fs.pathExists(statePath))) {
    return { steps_done: 0, parts: [] }
  }
  return parseEngineState(YAML.parse(await fs.readFile(statePath, 'utf8')))
}

/**
 * MD engine that integrates through an external OpenMM script.
 *
 * `prepare` writes `<deffnm>_openmm.yaml`; every `runWalltime` call runs
 * `script <config> --part N --walltime H`, which appends
 * `<deffnm>.partNNNN.<type>` and rewrites `<deffnm>_state.yaml`.
 */
export class OpenMMScriptEngine implements MDEngine {
  static readonly outputTrajType: string = 'dcd'

  readonly outputTrajType: string
  private workdir: string | null = null
  private deffnm: string | null = null
  private structureFile: string | null = null
  private partsDone = 0
  private steps = 0

  constructor(private readonly options: OpenMMEngineOptions) {
    this.outputTrajType = (options.outputTrajType ?? OpenMMScriptEngine.outputTrajType).toLowerCase()
  }

  get stepsDone(): number {
    return this.steps
  }

  async prepare(
    startingConfiguration: Trajectory,
    workdir: string,
    deffnm: string
  ): Promise<void> {
    await fs.ensureDir(workdir)
    const cfg = {
      deffnm,
      workdir,
      output_traj_type: this.outputTrajType,
      starting_configuration: {
        trajectory_files: [...startingConfiguration.trajectoryFiles],
        structure_file: startingConfiguration.structureFile
      },
      mdconfig: this.options.mdconfig
    }
    const configPath = path.join(workdir, configFileName(deffnm))
    const tmpPath = `${configPath}.tmp`
    await fs.writeFile(tmpPath, YAML.stringify(cfg, { sortMapEntries: true, lineWidth: 0 }), 'utf8')
    await fs.rename(tmpPath, configPath)
    logger.info(`OpenMM engine config written: ${configPath}`)

    this.attach(workdir, deffnm, startingConfiguration.structureFile)
    this.partsDone = 0
    this.steps = 0
  }

  async prepareFromFiles(workdir: string, deffnm: string): Promise<void> {
    const structureFile = await readStructureFile(workdir, deffnm)
    this.attach(workdir, deffnm, structureFile)
    const state = await readState(workdir, deffnm)
    this.partsDone = state.parts.length
    this.steps = state.steps_done
    logger.info(`Continuing ${deffnm} after ${this.partsDone} parts (${this.steps} steps)`)
  }

  async runWalltime(walltime: number): Promise<Trajectory> {
    const { workdir, deffnm } = this.requireAttached()
    const part = this.partsDone + 1
    const env = {
      ...(this.options.platform ? { OPENMM_PLATFORM: this.options.platform } : {}),
      ...(this.options.pluginDir ? { OPENMM_PLUGIN_DIR: this.options.pluginDir } : {})
    }
    const result = await runPythonStep(
      this.options.scriptPath ?? config.scripts.openmmSegment(),
      [path.join(workdir, configFileName(deffnm)), '--part', String(part), '--walltime', String(walltime)],
      {
        cwd: workdir,
        pythonBin: this.options.pythonBin,
        env,
        timeoutMs: this.options.timeoutMs,
        onStdoutLine: (line) => logger.info(`[${deffnm} part ${part}][stdout] ${line}`),
        onStderrLine: (line) => logger.error(`[${deffnm} part ${part}][stderr] ${line}`)
      }
    )
    if (result.code !== 0) {
      throw new Error(`OpenMM segment ${part} of ${deffnm} failed (${describeExit(result)})`)
    }
    const state = await readState(workdir, deffnm)
    this.partsDone = part
    this.steps = state.steps_done
    return this.openSegment(
      path.join(workdir, segmentFileName(deffnm, part, this.outputTrajType)),
      deffnm
    )
  }

  async openSegment(trajectoryFile: string, deffnm: string): Promise<Trajectory> {
    const workdir = path.dirname(trajectoryFile)
    const structureFile =
      this.workdir === workdir && this.deffnm === deffnm && this.structureFile !== null
        ? this.structureFile
        : await readStructureFile(workdir, deffnm)
    const state = await readState(workdir, deffnm)
    const record = state.parts.find((p) => p.file === path.basename(trajectoryFile))
    if (!record) {
      throw new Error(`${trajectoryFile} is not a part recorded in the engine state`)
    }
    return { trajectoryFiles: [trajectoryFile], structureFile, length: record.n_frames }
  }

  private attach(workdir: string, deffnm: string, structureFile: string) {
    this.workdir = workdir
    this.deffnm = deffnm
    this.structureFile = structureFile
  }

  private requireAttached(): { workdir: string; deffnm: string } {
    if (this.workdir === null || this.deffnm === null) {
      throw new Error('Engine is not prepared, call prepare() or prepareFromFiles() first')
    }
    return { workdir: this.workdir, deffnm: this.deffnm }
  }
}
