import { createLogger, transports, format } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf, colorize } = format

const customTimestamp = () =>
  moment().tz(config.timezone).format('YYYY-MM-DD HH:mm:ss')

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label}] ${message}`
})

// Validate log level
const validLogLevels = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly'
]
const logLevel = validLogLevels.includes(config.logLevel)
  ? config.logLevel
  : 'info'

if (!validLogLevels.includes(config.logLevel)) {
  console.warn(`Invalid LOG_LEVEL "${config.logLevel}", defaulting to "info"`)
}

const loggerTransports = [
  new DailyRotateFile({
    level: logLevel,
    filename: `${config.logDir}/jec-dispatch-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d'
  }),
  new DailyRotateFile({
    level: 'error',
    filename: `${config.logDir}/jec-dispatch-error-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '30d'
  }),
  // stdout is reserved for command output (dry runs, listings)
  new transports.Console({
    level: logLevel,
    stderrLevels: validLogLevels,
    format: combine(colorize(), logFormat)
  })
]

const logger = createLogger({
  level: logLevel,
  format: combine(
    label({ label: 'jec-dispatch' }),
    timestamp({ format: customTimestamp }),
    logFormat
  ),
  transports: loggerTransports
})

logger.debug(`Logger initialized with level: ${logLevel}`)

export { logger }
