import dotenv from 'dotenv'
import os from 'os'
dotenv.config()

const getEnvVar = (name: string): string => {
  const value = process.env[name]
  if (!value) {
    throw new Error(`Environment variable ${name} is not set`)
  }
  return value
}

const getNumericEnvVar = (name: string, fallback: number): number => {
  const raw = process.env[name]
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive number, got "${raw}"`)
  }
  return value
}

export const config = {
  maxProcess: getNumericEnvVar('MAX_PROCESS', os.cpus().length || 1),
  logDir: process.env.LOG_DIR || './logs',
  logLevel: process.env.LOG_LEVEL || 'info',
  logTimezone: process.env.LOG_TIMEZONE || 'UTC',
  pythonBin: process.env.PYTHON_BIN || 'python3',
  scriptTimeoutMs: getNumericEnvVar('SCRIPT_TIMEOUT_MS', 2 * 60 * 60 * 1000),
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: getNumericEnvVar('REDIS_PORT', 6379),
  workerConcurrency: getNumericEnvVar('WORKER_CONCURRENCY', 4),
  configPort: getNumericEnvVar('CONFIG_PORT', 3000),
  version: process.env.WORKER_VERSION || '0.0.0',
  gitHash: process.env.WORKER_GIT_HASH || '',
  scripts: {
    // only needed once an engine or concatenator actually spawns them
    openmmSegment: () => getEnvVar('OPENMM_SEGMENT_SCRIPT'),
    concatenate: () => getEnvVar('CONCAT_SCRIPT')
  }
}
