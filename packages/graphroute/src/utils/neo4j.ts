/**
 * Neo4j Type Conversion Utilities
 *
 * Converts values coming out of neo4j-driver records into plain JavaScript
 * so results look the same whichever driver produced them.
 */

/**
 * Neo4j Integer type (has toNumber method)
 */
interface Neo4jInteger {
  toNumber(): number
}

/**
 * Neo4j DateTime type (has toStandardDate method)
 */
interface Neo4jDateTime {
  toStandardDate(): Date
}

/**
 * Neo4j Node or Relationship
 */
interface Neo4jEntity {
  properties: Record<string, unknown>
  labels?: string[]
  type?: string
}

/**
 * Check if a value is a Neo4j Integer.
 */
function isNeo4jInteger(value: unknown): value is Neo4jInteger {
  return (
    typeof value === "object" &&
    value !== null &&
    "toNumber" in value &&
    typeof value.toNumber === "function"
  )
}

/**
 * Check if a value is a Neo4j DateTime.
 */
function isNeo4jDateTime(value: unknown): value is Neo4jDateTime {
  return (
    typeof value === "object" &&
    value !== null &&
    "toStandardDate" in value &&
    typeof value.toStandardDate === "function"
  )
}

/**
 * Check if a value is a Neo4j Node or Relationship.
 */
function isNeo4jEntity(value: unknown): value is Neo4jEntity {
  return (
    typeof value === "object" &&
    value !== null &&
    "properties" in value &&
    typeof value.properties === "object" &&
    value.properties !== null &&
    ("labels" in value || "type" in value)
  )
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Convert a single Neo4j value to its JavaScript equivalent.
 *
 * Handles:
 * - Neo4j Integer → number
 * - Neo4j DateTime → Date
 * - Nodes and relationships → `{ labels | type, properties }`
 * - Arrays and maps (recursive conversion)
 * - Null/undefined passthrough
 */
export function convertNeo4jValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (isNeo4jInteger(value)) {
    return value.toNumber()
  }

  if (isNeo4jDateTime(value)) {
    return value.toStandardDate()
  }

  if (Array.isArray(value)) {
    return value.map((v) => convertNeo4jValue(v))
  }

  if (isNeo4jEntity(value)) {
    const properties = convertNeo4jProperties(value.properties)
    return value.labels ? { labels: [...value.labels], properties } : { type: value.type, properties }
  }

  if (isPlainObject(value)) {
    return convertNeo4jProperties(value)
  }

  return value
}

/**
 * Convert a record of Neo4j values to plain JavaScript types.
 */
export function convertNeo4jProperties(props: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(props)) {
    result[key] = convertNeo4jValue(value)
  }

  return result
}
