/**
 * Driver Collaborator Contract
 *
 * What the connection layer requires from a wire-protocol implementation.
 * Bolt and http adapters ship with the package; anything else can be plugged
 * in through a {@link DriverFactory}.
 */

import type { ConnectionConfiguration } from "../config"
import type { QueryResult, ResultCollection } from "./result"

// =============================================================================
// DRIVER / SESSION INTERFACE
// =============================================================================

export type StatementParameters = Record<string, unknown>

/**
 * A configured driver bound to one server (or one http endpoint).
 */
export interface DriverHandle {
  /** Unique name for this driver kind (e.g., 'bolt', 'http', 'in-memory') */
  readonly name: string

  /** Address the driver talks to (`host:port` or base url) */
  readonly address: string

  /** Open a new session */
  session(): SessionHandle

  /** Release pooled connections */
  close(): Promise<void>
}

/**
 * A logical connection context through which statements run.
 */
export interface SessionHandle {
  run(statement: string, parameters: StatementParameters, tag?: string): Promise<QueryResult>

  createPipeline(query?: string, parameters?: StatementParameters, tag?: string): Pipeline

  transaction(): Transaction

  close(): Promise<void>
}

/**
 * A batch of statements executed in one unit.
 */
export interface Pipeline {
  push(text: string, parameters?: StatementParameters, tag?: string): void

  /** Number of queued statements */
  size(): number

  run(): Promise<ResultCollection>
}

/**
 * An explicit transaction.
 */
export interface Transaction {
  run(statement: string, parameters?: StatementParameters, tag?: string): Promise<QueryResult>
  commit(): Promise<void>
  rollback(): Promise<void>
  isOpen(): boolean
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Username/password pair.
 */
export interface Credentials {
  username: string
  password: string
}

/**
 * Settings used to build bolt drivers. The same snapshot is reused when the
 * router rebuilds a driver against another cluster member.
 */
export interface BoltSettings {
  credentials: Credentials
  encrypted: boolean
  /** Original scheme, used to keep `bolt+s` / `bolt+ssc` transport */
  scheme: string
  configuration: ConnectionConfiguration
}

/**
 * Builds driver handles.
 */
export interface DriverFactory {
  /** Build a bolt driver against `host:port` */
  bolt(address: string, settings: BoltSettings): DriverHandle

  /** Build an http driver from the full original uri */
  http(uri: string, configuration: ConnectionConfiguration): DriverHandle
}
