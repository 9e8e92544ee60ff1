/**
 * Statement Classifier
 *
 * Decides whether a Cypher statement has to go to a write server.
 */

import { RoutingMode, type AccessMode } from "./mode"

/**
 * Uppercase Cypher clauses that modify the graph, matched as whole words.
 */
export const WRITE_KEYWORDS = ["CREATE", "SET", "MERGE", "DELETE"] as const

const WRITE_PATTERN = new RegExp(`\\b(?:${WRITE_KEYWORDS.join("|")})\\b`)

/**
 * Classify a statement as READ or WRITE.
 *
 * Matching is case-sensitive: keywords are recognised in their uppercase
 * form only, so `MATCH (n) WHERE n.created > 0` stays a read.
 *
 * @example
 * ```typescript
 * classifyStatement('MATCH (n) RETURN n') // RoutingMode.Read
 * classifyStatement('MATCH (n) DETACH DELETE n') // RoutingMode.Write
 * ```
 */
export function classifyStatement(statement: string): AccessMode {
  return WRITE_PATTERN.test(statement) ? RoutingMode.Write : RoutingMode.Read
}

export function isWriteStatement(statement: string): boolean {
  return classifyStatement(statement) === RoutingMode.Write
}
