import pino from "pino"

const logLevel = process.env.GRAPHROUTE_LOG_LEVEL || process.env.LOG_LEVEL || "info"

export const logger = pino({
  name: "graphroute",
  level: logLevel,
})

export type Logger = typeof logger
