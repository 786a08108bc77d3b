import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import type {
  CommittorShotJob,
  CommittorShotJobData,
  CommittorShotResult
} from '../../types/jobtypes.js'
import { cachedCondition, scriptCondition } from '../functions/condition-functions.js'
import { OpenMMScriptEngine } from '../functions/openmm-functions.js'
import type { OpenMMEngineOptions } from '../functions/openmm-functions.js'
import type { StitchingExecutor } from '../functions/stitching-functions.js'
import { ConditionalTrajectoryPropagator } from '../pipelines/conditional-propagation.js'

const buildPropagator = (
  data: CommittorShotJobData,
  stitcher: StitchingExecutor
): ConditionalTrajectoryPropagator<OpenMMEngineOptions> =>
  new ConditionalTrajectoryPropagator<OpenMMEngineOptions>({
    conditions: data.states.map((state) =>
      cachedCondition(
        scriptCondition(state.name, state.script, { timeoutMs: config.scriptTimeoutMs })
      )
    ),
    engineClass: OpenMMScriptEngine,
    engineOptions: {
      mdconfig: data.mdconfig,
      outputTrajType: data.outputTrajType,
      timeoutMs: config.scriptTimeoutMs
    },
    walltimePerPart: data.walltimePerPart,
    maxSteps: data.maxSteps,
    maxFrames: data.maxFrames,
    stitcher
  })

// One committor shot: propagate from the starting configuration until a state
// is reached, then write the path up to the first frame in that state.
const processCommittorShot = async (
  MQjob: CommittorShotJob,
  stitcher: StitchingExecutor
): Promise<CommittorShotResult> => {
  const data = MQjob.data
  await MQjob.updateProgress(1)
  await MQjob.log(`start ${data.continuation ? 'continuation of' : ''} ${data.deffnm}`.trim())

  const propagator = buildPropagator(data, stitcher)
  await MQjob.updateProgress(5)

  const { segments } = await propagator.propagate(
    data.startingConfiguration,
    data.workdir,
    data.deffnm,
    data.continuation ?? false
  )
  await MQjob.log(`propagation done after ${segments.length} parts`)
  await MQjob.updateProgress(80)

  const { trajectory, conditionIndex } = await propagator.cutAndConcatenate(
    segments,
    data.trajOut,
    data.overwrite ?? false
  )
  const state = data.states[conditionIndex].name
  await MQjob.log(`reached ${state}, wrote ${trajectory.length} frames to ${data.trajOut}`)
  await MQjob.updateProgress(100)
  logger.info(`Committor shot ${data.uuid} reached ${state}`)

  return {
    uuid: data.uuid,
    conditionIndex,
    state,
    trajOut: data.trajOut,
    frames: trajectory.length
  }
}

export { processCommittorShot }
