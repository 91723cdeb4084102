import winston from "winston"

const LOG_LEVELS = ["error", "warn", "info", "debug"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value)

const format = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.printf(({ timestamp, level, message, label }) => {
    const scope = typeof label === "string" ? ` [${label}]` : ""
    return `${timestamp}  ${level.toUpperCase()}${scope}: ${message}`
  })
)

const envLevel = process.env.OS_LOG_LEVEL

const logger = winston.createLogger({
  level: isLogLevel(envLevel) ? envLevel : "info",
  format,
  transports: [new winston.transports.Console()],
})

// Child logger that tags every line with the component it came from
export const getLogger = (label: string) => logger.child({ label })

export const setLogLevel = (level: LogLevel) => {
  logger.level = level
}

export default logger
