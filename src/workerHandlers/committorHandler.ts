import { UnrecoverableError } from 'bullmq'
import { logger } from '../helpers/loggers.js'
import { PropagationError } from '../services/functions/errors.js'
import type { StitchingExecutor } from '../services/functions/stitching-functions.js'
import { processCommittorShot } from '../services/process/committor-shot.js'
import type { CommittorShotJob, CommittorShotResult } from '../types/jobtypes.js'

export const createCommittorHandler =
  (stitcher: StitchingExecutor) =>
  async (job: CommittorShotJob): Promise<CommittorShotResult> => {
    logger.info(`committorHandler: ${JSON.stringify(job.data)}`)
    try {
      logger.info(`Start committor shot: ${job.name}`)
      const result = await processCommittorShot(job, stitcher)
      logger.info(`Finish job: ${job.name}`)
      return result
    } catch (error) {
      logger.error(`Error processing job ${job.id}: ${error}`)
      // propagation errors are deterministic, a retry fails the same way
      if (error instanceof PropagationError) {
        throw new UnrecoverableError(error.message)
      }
      throw error
    }
  }
