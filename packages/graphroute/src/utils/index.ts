/**
 * Utility exports.
 */

export { convertNeo4jValue, convertNeo4jProperties } from "./neo4j"
export { logger } from "./logger"
export type { Logger } from "./logger"
