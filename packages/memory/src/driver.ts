/**
 * In-Memory Database Driver
 *
 * Implements the driver collaborator contract against an InMemoryCluster.
 * Nothing leaves the process; each call is answered by the cluster and
 * recorded with the driver's address.
 */

import {
  ResultCollection,
  type DriverHandle,
  type Pipeline,
  type QueryResult,
  type SessionHandle,
  type StatementParameters,
  type Transaction,
} from "graphroute"
import type { InMemoryCluster } from "./cluster"

interface QueuedStatement {
  statement: string
  parameters: StatementParameters
  tag?: string
}

class InMemoryPipeline implements Pipeline {
  private readonly queue: QueuedStatement[] = []

  constructor(
    private readonly cluster: InMemoryCluster,
    private readonly address: string,
  ) {}

  push(text: string, parameters: StatementParameters = {}, tag?: string): void {
    this.queue.push({ statement: text, parameters, tag })
  }

  size(): number {
    return this.queue.length
  }

  async run(): Promise<ResultCollection> {
    const collection = new ResultCollection()
    for (const entry of this.queue) {
      collection.add(this.cluster.execute({ ...entry, address: this.address, via: "pipeline" }))
    }
    return collection
  }
}

/**
 * Transaction context. Statements run as they arrive; commit and rollback
 * only close the transaction.
 */
export class InMemoryTransaction implements Transaction {
  private state: "open" | "committed" | "rolledBack" = "open"

  constructor(
    private readonly cluster: InMemoryCluster,
    private readonly address: string,
  ) {}

  get outcome(): "open" | "committed" | "rolledBack" {
    return this.state
  }

  async run(statement: string, parameters: StatementParameters = {}, tag?: string): Promise<QueryResult> {
    this.assertOpen()
    return this.cluster.execute({ statement, parameters, tag, address: this.address, via: "transaction" })
  }

  async commit(): Promise<void> {
    this.assertOpen()
    this.state = "committed"
  }

  async rollback(): Promise<void> {
    this.assertOpen()
    this.state = "rolledBack"
  }

  isOpen(): boolean {
    return this.state === "open"
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`Transaction already ${this.state}`)
    }
  }
}

export class InMemorySession implements SessionHandle {
  private closed = false

  constructor(
    private readonly cluster: InMemoryCluster,
    readonly address: string,
  ) {}

  get isClosed(): boolean {
    return this.closed
  }

  async run(statement: string, parameters: StatementParameters, tag?: string): Promise<QueryResult> {
    return this.cluster.execute({ statement, parameters, tag, address: this.address, via: "session" })
  }

  createPipeline(query?: string, parameters: StatementParameters = {}, tag?: string): Pipeline {
    const pipeline = new InMemoryPipeline(this.cluster, this.address)
    if (query) {
      pipeline.push(query, parameters, tag)
    }
    return pipeline
  }

  transaction(): Transaction {
    return new InMemoryTransaction(this.cluster, this.address)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * In-memory database driver bound to one cluster address.
 */
export class InMemoryDriver implements DriverHandle {
  readonly name: string

  constructor(
    private readonly cluster: InMemoryCluster,
    readonly address: string,
    kind: "bolt" | "http" = "bolt",
  ) {
    this.name = `in-memory-${kind}`
  }

  session(): SessionHandle {
    this.cluster.sessionOpened(this.address)
    return new InMemorySession(this.cluster, this.address)
  }

  async close(): Promise<void> {
    this.cluster.driverClosed(this.address)
  }
}

/**
 * Create a standalone in-memory driver.
 */
export function createInMemoryDriver(cluster: InMemoryCluster, address = "memory:7687"): InMemoryDriver {
  return new InMemoryDriver(cluster, address)
}
