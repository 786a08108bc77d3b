import { Worker, WorkerOptions } from 'bullmq'
import { logger } from '../helpers/loggers.js'
import type { StitchingExecutor } from '../services/functions/stitching-functions.js'
import type { CommittorShotResult, WorkerJob } from '../types/jobtypes.js'
import { createCommittorHandler } from '../workerHandlers/committorHandler.js'

export const COMMITTOR_QUEUE = 'committor'

export const createCommittorWorker = (
  options: WorkerOptions,
  stitcher: StitchingExecutor
): Worker<WorkerJob, CommittorShotResult> => {
  let activeJobsCount = 0
  const committorWorker = new Worker<WorkerJob, CommittorShotResult>(
    COMMITTOR_QUEUE,
    createCommittorHandler(stitcher),
    options
  )
  logger.info(`Committor Worker started`)

  committorWorker.on('active', () => {
    activeJobsCount++
    logger.info(`Committor Worker Active Jobs: ${activeJobsCount}`)
  })

  committorWorker.on('completed', (job, result) => {
    activeJobsCount--
    logger.info(
      `Committor job ${job.id} reached ${result.state}, active jobs: ${activeJobsCount}`
    )
  })

  committorWorker.on('failed', (job, error) => {
    activeJobsCount--
    logger.info(
      `Committor job ${job?.id} failed (${error.message}), active jobs: ${activeJobsCount}`
    )
  })

  return committorWorker
}
