import pino, { type Logger } from 'pino'

const isTest = process.env.NODE_ENV === 'test'
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info')

export const logger = pino({
  level: logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
})

// Child loggers tag every line with the component that wrote it.
export const createLogger = (component: string) => logger.child({ component })

export type { Logger }
