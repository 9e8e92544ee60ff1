/**
 * Bolt Driver
 *
 * Adapts neo4j-driver to the driver collaborator contract. Each driver is
 * bound to one server address; cluster routing happens one level up, so the
 * underlying driver always speaks direct `bolt://` to that address.
 */

import {
  auth,
  driver as createNeo4jDriver,
  Neo4jError,
  type Config,
  type Driver,
  type Record as Neo4jRecord,
  type ResultSummary as Neo4jSummary,
  type Session,
  type Transaction as Neo4jTransaction,
} from "neo4j-driver"
import { DriverFailureError } from "../../errors"
import { convertNeo4jValue } from "../../utils/neo4j"
import { QueryResult, ResultCollection, ResultRecord, type ResultSummary } from "../result"
import type {
  BoltSettings,
  DriverHandle,
  StatementParameters,
  Pipeline,
  SessionHandle,
  Transaction,
} from "../types"

const SECURE_SCHEMES = new Set(["bolt+s", "bolt+ssc"])

/**
 * Build the neo4j-driver url for an address, keeping `+s` / `+ssc` transport.
 */
export function boltUrl(address: string, scheme: string): string {
  return `${SECURE_SCHEMES.has(scheme) ? scheme : "bolt"}://${address}`
}

/**
 * Build the neo4j-driver config for the given settings.
 */
export function boltConfig(settings: BoltSettings): Config {
  const { configuration } = settings
  const config: Config = {}

  // Encryption for +s / +ssc schemes comes from the url; neo4j-driver rejects both.
  if (!SECURE_SCHEMES.has(settings.scheme)) {
    if (settings.encrypted || configuration.encrypted !== undefined) {
      const encrypted = settings.encrypted || configuration.encrypted === true
      config.encrypted = encrypted ? "ENCRYPTION_ON" : "ENCRYPTION_OFF"
    }
    if (configuration.trust) {
      config.trust = configuration.trust
    }
  }

  if (configuration.pool?.maxSize) {
    config.maxConnectionPoolSize = configuration.pool.maxSize
  }
  if (configuration.pool?.acquisitionTimeout !== undefined) {
    config.connectionAcquisitionTimeout = configuration.pool.acquisitionTimeout
  }
  if (configuration.connectionTimeout !== undefined) {
    config.connectionTimeout = configuration.connectionTimeout
  }
  if (configuration.userAgent) {
    config.userAgent = configuration.userAgent
  }

  return config
}

function toResultRecord(record: Neo4jRecord): ResultRecord {
  const keys = record.keys.map((key) => String(key))
  const values = record.keys.map((key) => convertNeo4jValue(record.get(key)))
  return new ResultRecord(keys, values)
}

function toSummary(summary: Neo4jSummary): ResultSummary {
  const availableAfter = convertNeo4jValue(summary.resultAvailableAfter)
  return {
    counters: summary.counters.updates(),
    server: {
      version: summary.server.agent,
      address: summary.server.address,
    },
    ...(typeof availableAfter === "number" ? { resultAvailableAfter: availableAfter } : {}),
  }
}

/**
 * Translate neo4j-driver failures into {@link DriverFailureError}.
 */
async function translate<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work()
  } catch (error) {
    if (error instanceof Neo4jError) {
      throw new DriverFailureError(error.message, error.code, error)
    }
    throw error
  }
}

async function runOn(
  runner: Session | Neo4jTransaction,
  statement: string,
  parameters: StatementParameters,
  tag?: string,
): Promise<QueryResult> {
  return translate(async () => {
    const result = await runner.run(statement, parameters)
    return new QueryResult(result.records.map(toResultRecord), toSummary(result.summary), tag)
  })
}

/**
 * Statements queued on a bolt session and run back to back.
 */
class BoltPipeline implements Pipeline {
  private readonly queue: { text: string; parameters: StatementParameters; tag?: string }[] = []

  constructor(private readonly session: Session) {}

  push(text: string, parameters: StatementParameters = {}, tag?: string): void {
    this.queue.push({ text, parameters, tag })
  }

  size(): number {
    return this.queue.length
  }

  async run(): Promise<ResultCollection> {
    const collection = new ResultCollection()
    for (const entry of this.queue) {
      collection.add(await runOn(this.session, entry.text, entry.parameters, entry.tag))
    }
    return collection
  }
}

class BoltTransaction implements Transaction {
  constructor(private readonly tx: Neo4jTransaction) {}

  run(statement: string, parameters: StatementParameters = {}, tag?: string): Promise<QueryResult> {
    return runOn(this.tx, statement, parameters, tag)
  }

  commit(): Promise<void> {
    return translate(() => this.tx.commit())
  }

  rollback(): Promise<void> {
    return translate(() => this.tx.rollback())
  }

  isOpen(): boolean {
    return this.tx.isOpen()
  }
}

class BoltSession implements SessionHandle {
  constructor(private readonly session: Session) {}

  run(statement: string, parameters: StatementParameters, tag?: string): Promise<QueryResult> {
    return runOn(this.session, statement, parameters, tag)
  }

  createPipeline(query?: string, parameters: StatementParameters = {}, tag?: string): Pipeline {
    const pipeline = new BoltPipeline(this.session)
    if (query) {
      pipeline.push(query, parameters, tag)
    }
    return pipeline
  }

  transaction(): Transaction {
    return new BoltTransaction(this.session.beginTransaction())
  }

  close(): Promise<void> {
    return this.session.close()
  }
}

/**
 * Driver handle over a neo4j-driver instance.
 */
export class BoltDriver implements DriverHandle {
  readonly name = "bolt"
  private readonly driver: Driver

  constructor(
    readonly address: string,
    private readonly settings: BoltSettings,
  ) {
    const { username, password } = settings.credentials
    this.driver = createNeo4jDriver(
      boltUrl(address, settings.scheme),
      auth.basic(username, password),
      boltConfig(settings),
    )
  }

  session(): SessionHandle {
    const database = this.settings.configuration.database
    return new BoltSession(this.driver.session(database ? { database } : {}))
  }

  close(): Promise<void> {
    return this.driver.close()
  }
}
