import { createLogger, transports, format } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf, colorize, splat } = format
const logsFolder = config.logDir

const customTimestamp = () =>
  moment().tz(config.logTimezone).format('YYYY-MM-DD HH:mm:ss')

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label}] ${message}`
})

const loggerTransports = [
  new DailyRotateFile({
    filename: `${logsFolder}/segmd-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '20m',
    maxFiles: '14d'
  }),
  new DailyRotateFile({
    level: 'error',
    filename: `${logsFolder}/segmd-error-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '20m',
    maxFiles: '30d'
  }),
  new transports.Console({ format: combine(colorize(), logFormat) })
]

const logger = createLogger({
  level: config.logLevel,
  format: combine(
    splat(),
    label({ label: 'segmd' }),
    timestamp({ format: customTimestamp }),
    logFormat
  ),
  transports: loggerTransports
})

export { logger, logsFolder }
