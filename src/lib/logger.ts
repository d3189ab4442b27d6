import winston from 'winston'

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

// Define colors for each log level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
}

// Tell Winston to use these colors
winston.addColors(colors)

/** Structured logger handed out to each pipeline stage */
export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void
  warn: (message: string, meta?: Record<string, unknown>) => void
  info: (message: string, meta?: Record<string, unknown>) => void
  debug: (message: string, meta?: Record<string, unknown>) => void
}

const isLevel = (value: string): value is keyof typeof levels => value in levels

// LOG_LEVEL wins; otherwise verbose in development and quiet elsewhere
const level = () => {
  const configured = process.env.LOG_LEVEL?.toLowerCase()
  if (configured && isLevel(configured)) {
    return configured
  }
  const env = process.env.NODE_ENV || 'development'
  const isDevelopment = env === 'development'
  return isDevelopment ? 'debug' : 'warn'
}

// Simple console logger for tests
const createTestLogger = (service: string): Logger => {
  return {
    error: (message, meta) => {
      console.error(`[ERROR] ${service}: ${message}`, meta)
    },
    warn: (message, meta) => {
      console.warn(`[WARN] ${service}: ${message}`, meta)
    },
    info: (message, meta) => {
      console.info(`[INFO] ${service}: ${message}`, meta)
    },
    debug: (message, meta) => {
      console.debug(`[DEBUG] ${service}: ${message}`, meta)
    },
  }
}

// Define log format
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`,
  ),
)

// Console only: persisting logs belongs to whoever embeds the pipeline
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
]

// Create logger instance
const logger = winston.createLogger({
  level: level(),
  levels,
  format,
  transports,
})

/**
 * Creates a structured logger instance for a specific pipeline stage
 * @param service - The name of the stage using the logger
 */
export const createLogger = (service: string): Logger => {
  if (process.env.NODE_ENV === 'test') {
    return createTestLogger(service)
  }

  return {
    error: (message, meta) => {
      logger.error(`${service}: ${message}`, meta)
    },
    warn: (message, meta) => {
      logger.warn(`${service}: ${message}`, meta)
    },
    info: (message, meta) => {
      logger.info(`${service}: ${message}`, meta)
    },
    debug: (message, meta) => {
      logger.debug(`${service}: ${message}`, meta)
    },
  }
}
