import express from 'express'
import { Worker, WorkerOptions } from 'bullmq'
import { logger } from './helpers/loggers.js'
import { config } from './config/config.js'
import { createProcessLimiter } from './helpers/limiter.js'
import {
  ScriptTrajectoryConcatenator,
  StitchingExecutor
} from './services/functions/stitching-functions.js'
import { createCommittorWorker } from './workers/committorWorker.js'
import type { CommittorShotResult, WorkerJob } from './types/jobtypes.js'

const environment: string = process.env.NODE_ENV || 'development'

if (environment === 'production') {
  logger.info('Running in production mode')
} else {
  logger.info('Running in development mode')
}

// one limiter for every heavy child process this worker starts
const processLimiter = createProcessLimiter(config.maxProcess)
const stitcher = new StitchingExecutor(
  new ScriptTrajectoryConcatenator(config.scripts.concatenate(), {
    timeoutMs: config.scriptTimeoutMs
  }),
  processLimiter
)

const workerOptions: WorkerOptions = {
  connection: {
    host: config.redisHost,
    port: config.redisPort
  },
  concurrency: config.workerConcurrency,
  lockDuration: 60_000,
  lockRenewTime: 30_000
}

let committorWorker: Worker<WorkerJob, CommittorShotResult> | null = null

const startWorkers = () => {
  if (committorWorker) {
    logger.info('Workers are already initialized')
    return
  }
  logger.info(
    `Starting committor worker (concurrency ${config.workerConcurrency}, max ${config.maxProcess} processes)`
  )
  committorWorker = createCommittorWorker(workerOptions, stitcher)
}

const shutdown = async (signal: string) => {
  logger.info(`${signal} received, closing workers`)
  if (committorWorker) await committorWorker.close()
  process.exit(0)
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    logger.error(`Shutdown failed: ${error}`)
    process.exit(1)
  })
})

startWorkers()

const app = express()

app.get('/config', (req, res) => {
  res.json({
    gitHash: config.gitHash,
    version: config.version,
    maxProcess: processLimiter.capacity,
    activeProcesses: processLimiter.active,
    waitingProcesses: processLimiter.pending
  })
})

logger.info('Starting the Express server...')
app.listen(config.configPort, () => {
  logger.info(`Worker configuration server running on port ${config.configPort}`)
})
