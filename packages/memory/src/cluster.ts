/**
 * In-Memory Cluster
 *
 * Stands in for a routed graph-database cluster. Members answer the routing
 * table query, canned responses answer everything else, and every execution
 * is recorded with the address it reached.
 */

import {
  DriverFailureError,
  QueryResult,
  ROUTING_TABLE_QUERY,
  type BoltSettings,
  type ConnectionConfiguration,
  type DriverFactory,
  type StatementParameters,
} from "graphroute"
import { InMemoryDriver } from "./driver"

export type MemberRole = "WRITE" | "READ" | "ROUTE"

export interface ClusterMember {
  address: string
  role: MemberRole
}

/**
 * Rows returned for a statement.
 */
export interface CannedResponse {
  keys: string[]
  rows: unknown[][]
}

export interface ExecutionContext {
  address: string
  statement: string
  parameters: StatementParameters
}

export type Responder = CannedResponse | ((context: ExecutionContext) => CannedResponse)

/**
 * One statement that reached the cluster.
 */
export interface ExecutionRecord extends ExecutionContext {
  tag?: string
  via: "session" | "pipeline" | "transaction"
}

/**
 * A driver built by the cluster's factory.
 */
export interface BuildRecord {
  kind: "bolt" | "http"
  address: string
  settings?: BoltSettings
  configuration?: ConnectionConfiguration
}

interface Handler {
  pattern: string | RegExp
  respond: (context: ExecutionContext) => CannedResponse
}

interface Failure {
  pattern: string | RegExp
  code: string
  message: string
}

function matches(pattern: string | RegExp, statement: string): boolean {
  return typeof pattern === "string" ? statement.includes(pattern) : pattern.test(statement)
}

export interface InMemoryClusterConfig {
  members?: ClusterMember[]
  /** Routing table time-to-live reported in the first column */
  ttl?: number
}

export class InMemoryCluster {
  readonly executions: ExecutionRecord[] = []
  readonly buildLog: BuildRecord[] = []
  readonly closedDrivers: string[] = []
  readonly sessionsOpened = new Map<string, number>()

  private readonly members: ClusterMember[]
  private readonly ttl: number
  private readonly handlers: Handler[] = []
  private readonly failures: Failure[] = []
  private routingResponse: CannedResponse | null = null

  constructor(config: InMemoryClusterConfig = {}) {
    this.members = [...(config.members ?? [])]
    this.ttl = config.ttl ?? 300
  }

  addMember(address: string, role: MemberRole): this {
    this.members.push({ address, role })
    return this
  }

  /**
   * Answer statements containing `pattern` (or matching it) with `responder`.
   * Later registrations win.
   */
  on(pattern: string | RegExp, responder: Responder): this {
    const respond = typeof responder === "function" ? responder : () => responder
    this.handlers.unshift({ pattern, respond })
    return this
  }

  /**
   * Make statements containing `pattern` fail with a status code.
   */
  failOn(pattern: string | RegExp, code: string, message = `Statement failed: ${code}`): this {
    this.failures.push({ pattern, code, message })
    return this
  }

  /**
   * Replace the routing table answer, e.g. with a malformed one.
   */
  respondToRoutingWith(response: CannedResponse): this {
    this.routingResponse = response
    return this
  }

  /**
   * Factory whose drivers all run against this cluster.
   */
  driverFactory(): DriverFactory {
    return {
      bolt: (address, settings) => {
        this.buildLog.push({ kind: "bolt", address, settings })
        return new InMemoryDriver(this, address, "bolt")
      },
      http: (uri, configuration) => {
        this.buildLog.push({ kind: "http", address: uri, configuration })
        return new InMemoryDriver(this, uri, "http")
      },
    }
  }

  /**
   * Execution records that reached `address`.
   */
  executionsOn(address: string): ExecutionRecord[] {
    return this.executions.filter((record) => record.address === address)
  }

  /**
   * Addresses of every bolt driver built, in order.
   */
  boltAddresses(): string[] {
    return this.buildLog.filter((entry) => entry.kind === "bolt").map((entry) => entry.address)
  }

  // ---------------------------------------------------------------------------
  // Driver-facing API
  // ---------------------------------------------------------------------------

  execute(record: ExecutionRecord): QueryResult {
    this.executions.push(record)

    const failure = this.failures.find((entry) => matches(entry.pattern, record.statement))
    if (failure) {
      throw new DriverFailureError(failure.message, failure.code)
    }

    const response = this.respond(record)
    const summary = { server: { address: record.address } }
    return QueryResult.fromRows(response.keys, response.rows, summary, record.tag)
  }

  sessionOpened(address: string): void {
    this.sessionsOpened.set(address, (this.sessionsOpened.get(address) ?? 0) + 1)
  }

  driverClosed(address: string): void {
    this.closedDrivers.push(address)
  }

  private respond(context: ExecutionContext): CannedResponse {
    if (context.statement === ROUTING_TABLE_QUERY) {
      return this.routingResponse ?? this.routingTable()
    }

    const handler = this.handlers.find((entry) => matches(entry.pattern, context.statement))
    return handler ? handler.respond(context) : { keys: [], rows: [] }
  }

  private routingTable(): CannedResponse {
    const roles: MemberRole[] = ["WRITE", "READ", "ROUTE"]
    const servers = roles
      .map((role) => ({
        role,
        addresses: this.members.filter((member) => member.role === role).map((member) => member.address),
      }))
      .filter((server) => server.addresses.length > 0)

    return { keys: ["ttl", "servers"], rows: [[this.ttl, servers]] }
  }
}
