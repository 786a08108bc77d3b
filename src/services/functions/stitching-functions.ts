import path from 'path'
import fs from 'fs-extra'
import YAML from 'yaml'
import { logger } from '../../helpers/loggers.js'
import type { ProcessLimiter } from '../../helpers/limiter.js'
import { runPythonStep, describeExit } from '../../helpers/runPythonStep.js'
import type { SlicePlan, Trajectory } from '../../types/trajectory.js'
import { OutputAlreadyExistsError } from './errors.js'
import { slicePlanLength } from './slice-plan.js'

export interface ConcatenationRequest {
  plan: SlicePlan
  trajOut: string
  /** null: reuse the structure file of the first planned segment */
  structOut: string | null
  overwrite: boolean
}

/**
 * Physically reads the planned frames and writes one output trajectory.
 * Implementations do the heavy lifting outside the event loop (child process,
 * worker thread) and must invert momenta on negative-stride slices.
 */
export interface TrajectoryConcatenator {
  concatenate(request: ConcatenationRequest): Promise<Trajectory>
}

const writeYamlAtomically = async (filePath: string, content: unknown): Promise<void> => {
  await fs.ensureDir(path.dirname(filePath))
  const yamlText = YAML.stringify(content, { lineWidth: 0 })
  const tmpPath = `${filePath}.tmp`
  await fs.writeFile(tmpPath, yamlText, 'utf8')
  await fs.rename(tmpPath, filePath)
}

const planToYaml = ({ plan, trajOut, structOut, overwrite }: ConcatenationRequest) => ({
  output: {
    trajectory: trajOut,
    structure: structOut
  },
  overwrite,
  slices: plan.map(({ segment, start, stop, stride }) => ({
    trajectory_files: [...segment.trajectoryFiles],
    structure_file: segment.structureFile,
    start,
    stop,
    stride,
    invert_momenta: stride < 0
  }))
})

/**
 * Default concatenator: writes the plan as `<trajOut>.concat.yaml` and runs
 * the configured concatenation script on it in a child process.
 */
export class ScriptTrajectoryConcatenator implements TrajectoryConcatenator {
  constructor(
    private readonly scriptPath: string,
    private readonly opts: { pythonBin?: string; timeoutMs?: number } = {}
  ) {}

  async concatenate(request: ConcatenationRequest): Promise<Trajectory> {
    const { plan, trajOut, structOut } = request
    if (plan.length === 0) {
      throw new Error(`Refusing to write ${trajOut} from an empty slice plan`)
    }
    const planPath = `${trajOut}.concat.yaml`
    await writeYamlAtomically(planPath, planToYaml(request))
    logger.info(`Concatenating ${plan.length} slices into ${trajOut}`)

    try {
      const result = await runPythonStep(this.scriptPath, [planPath], {
        pythonBin: this.opts.pythonBin,
        timeoutMs: this.opts.timeoutMs,
        onStdoutLine: (line) => logger.info(`[concatenate][stdout] ${line}`),
        onStderrLine: (line) => logger.error(`[concatenate][stderr] ${line}`)
      })
      if (result.code !== 0) {
        throw new Error(`Concatenation into ${trajOut} failed (${describeExit(result)})`)
      }
    } finally {
      await fs.remove(planPath)
    }

    return {
      trajectoryFiles: [trajOut],
      structureFile: structOut ?? plan[0].segment.structureFile,
      length: slicePlanLength(plan)
    }
  }
}

/**
 * Runs concatenations under the process-wide limiter. The limiter is shared
 * with all other heavy work of the process, so a stitch may wait for a slot.
 * Only one stitch per output path runs at a time.
 */
export class StitchingExecutor {
  private readonly inFlight = new Set<string>()

  constructor(
    private readonly concatenator: TrajectoryConcatenator,
    readonly limiter: ProcessLimiter
  ) {}

  async stitch(
    plan: SlicePlan,
    trajOut: string,
    structOut: string | null = null,
    overwrite = false
  ): Promise<Trajectory> {
    const key = path.resolve(trajOut)
    if (this.inFlight.has(key)) {
      throw new OutputAlreadyExistsError(trajOut, true)
    }
    this.inFlight.add(key)
    try {
      const trajectory = await this.limiter.run(async () => {
        // checked once the slot is held, the file may have appeared while waiting
        if (!overwrite && (await fs.pathExists(trajOut))) {
          throw new OutputAlreadyExistsError(trajOut)
        }
        return this.concatenator.concatenate({ plan, trajOut, structOut, overwrite })
      })
      logger.info(`Wrote ${trajectory.length} frames to ${trajOut}`)
      return trajectory
    } finally {
      this.inFlight.delete(key)
    }
  }
}
