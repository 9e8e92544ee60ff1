/**
 * Connection Manager
 *
 * Registry of named connections. The first connection registered is the
 * master and serves every call that names no alias.
 */

import type { ConnectionConfiguration } from "../config"
import type { QueryResult, ResultCollection, StatementParameters } from "../driver"
import { AliasError } from "../errors"
import type { StatementStack } from "../statement"
import { Connection, type ConnectionOptions } from "./connection"

export class ConnectionManager {
  private readonly connections = new Map<string, Connection>()
  private master: string | null = null

  constructor(private readonly options: ConnectionOptions = {}) {}

  /**
   * Open and register a connection.
   *
   * @throws AliasError when the alias is already registered
   */
  async register(alias: string, uri: string, configuration?: ConnectionConfiguration): Promise<Connection> {
    if (this.connections.has(alias)) {
      throw new AliasError(`Connection alias "${alias}" is already registered`, alias, this.aliases())
    }

    const connection = await Connection.open(alias, uri, configuration, this.options)
    this.connections.set(alias, connection)
    if (this.master === null) {
      this.master = alias
    }
    return connection
  }

  /**
   * Get a connection by alias, or the master connection.
   *
   * @throws AliasError for an unknown alias or an empty registry
   */
  get(alias?: string): Connection {
    const name = alias ?? this.master
    if (name === null) {
      throw new AliasError("No connection has been registered", "", [])
    }

    const connection = this.connections.get(name)
    if (!connection) {
      throw new AliasError(
        `No connection registered with alias "${name}". Available: ${this.aliases().join(", ")}`,
        name,
        this.aliases(),
      )
    }
    return connection
  }

  has(alias: string): boolean {
    return this.connections.has(alias)
  }

  aliases(): string[] {
    return [...this.connections.keys()]
  }

  setMaster(alias: string): void {
    this.get(alias)
    this.master = alias
  }

  getMaster(): Connection {
    return this.get()
  }

  run(
    statement: string,
    parameters?: StatementParameters | null,
    tag?: string,
    alias?: string,
  ): Promise<QueryResult> {
    return this.get(alias).run(statement, parameters, tag)
  }

  /**
   * Run a stack as one pipeline on the stack's connection (or the master).
   */
  runStack(stack: StatementStack): Promise<ResultCollection> {
    return this.get(stack.connectionAlias).runMixed([stack])
  }

  /**
   * Close and forget every connection.
   */
  async close(): Promise<void> {
    const connections = [...this.connections.values()]
    this.connections.clear()
    this.master = null
    for (const connection of connections) {
      await connection.close()
    }
  }
}
