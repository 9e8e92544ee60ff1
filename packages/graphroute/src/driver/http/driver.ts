/**
 * HTTP Driver
 *
 * Talks to the transactional HTTP endpoint (`/db/{database}/tx`). Sessions are
 * stateless; a pipeline is one request carrying every queued statement.
 */

import { z } from "zod"
import type { ConnectionConfiguration } from "../../config"
import { DriverFailureError } from "../../errors"
import { resolveUri } from "../../uri"
import { QueryResult, ResultCollection, type ResultSummary } from "../result"
import type {
  DriverHandle,
  StatementParameters,
  Pipeline,
  SessionHandle,
  Transaction,
} from "../types"

export const DEFAULT_HTTP_DATABASE = "neo4j"

// =============================================================================
// WIRE FORMAT
// =============================================================================

const httpErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
})

const httpStatementResultSchema = z.object({
  columns: z.array(z.string()),
  data: z.array(z.object({ row: z.array(z.unknown()) }).passthrough()),
  stats: z.record(z.union([z.number(), z.boolean()])).optional(),
})

const httpResponseSchema = z.object({
  results: z.array(httpStatementResultSchema).default([]),
  errors: z.array(httpErrorSchema).default([]),
  commit: z.string().optional(),
})

type HttpResponseBody = z.infer<typeof httpResponseSchema>

interface QueuedStatement {
  statement: string
  parameters: StatementParameters
  tag?: string
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpDriverOptions {
  fetch?: FetchLike
}

function toSummary(stats: Record<string, number | boolean> | undefined, address: string): ResultSummary {
  const counters: Record<string, number> = {}
  for (const [key, value] of Object.entries(stats ?? {})) {
    if (typeof value === "number") counters[key] = value
  }
  return { counters, server: { address } }
}

// =============================================================================
// CLIENT
// =============================================================================

/**
 * Thin JSON client over fetch shared by sessions and transactions.
 */
class HttpClient {
  readonly base: string
  private readonly headers: Record<string, string>
  private readonly database: string

  constructor(
    uri: string,
    configuration: ConnectionConfiguration,
    private readonly fetchImpl: FetchLike,
  ) {
    const resolved = resolveUri(uri)
    const prefix = new URL(uri).pathname.replace(/\/+$/, "")
    this.base = `${resolved.scheme}://${resolved.host}:${resolved.port}${prefix}`
    this.database = configuration.database ?? DEFAULT_HTTP_DATABASE
    this.headers = {
      "Content-Type": "application/json",
      Accept: "application/json;charset=UTF-8",
      ...(configuration.userAgent ? { "User-Agent": configuration.userAgent } : {}),
      ...configuration.http?.headers,
    }
    if (resolved.user !== undefined && resolved.password !== undefined) {
      const token = Buffer.from(`${resolved.user}:${resolved.password}`).toString("base64")
      this.headers.Authorization = `Basic ${token}`
    }
  }

  get transactionEndpoint(): string {
    return `${this.base}/db/${encodeURIComponent(this.database)}/tx`
  }

  /**
   * Send statements and return the parsed body plus the Location header.
   */
  async send(
    method: "POST" | "DELETE",
    url: string,
    statements: readonly QueuedStatement[],
  ): Promise<{ body: HttpResponseBody; location: string | null }> {
    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body:
          method === "POST"
            ? JSON.stringify({
                statements: statements.map(({ statement, parameters }) => ({
                  statement,
                  parameters,
                  includeStats: true,
                })),
              })
            : undefined,
      })
    } catch (error) {
      throw new DriverFailureError(
        `HTTP request to ${url} failed`,
        "Http.ConnectionFailed",
        error instanceof Error ? error : undefined,
      )
    }

    const text = await response.text()
    const parsed = text ? httpResponseSchema.safeParse(safeJson(text)) : httpResponseSchema.safeParse({})

    const failure = parsed.success ? parsed.data.errors[0] : undefined
    if (failure) {
      throw new DriverFailureError(failure.message, failure.code)
    }
    if (!response.ok) {
      throw new DriverFailureError(
        `HTTP ${response.status} from ${url}`,
        `Http.Status.${response.status}`,
      )
    }
    if (!parsed.success) {
      throw new DriverFailureError(`Unexpected response body from ${url}`, "Http.InvalidResponse", parsed.error)
    }

    return { body: parsed.data, location: response.headers.get("location") }
  }

  toResults(body: HttpResponseBody, statements: readonly QueuedStatement[]): QueryResult[] {
    return body.results.map((result, position) =>
      QueryResult.fromRows(
        result.columns,
        result.data.map((entry) => entry.row),
        toSummary(result.stats, this.base),
        statements[position]?.tag,
      ),
    )
  }

  async commit(statements: readonly QueuedStatement[]): Promise<QueryResult[]> {
    const { body } = await this.send("POST", `${this.transactionEndpoint}/commit`, statements)
    return this.toResults(body, statements)
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

// =============================================================================
// SESSION / PIPELINE / TRANSACTION
// =============================================================================

class HttpPipeline implements Pipeline {
  private readonly queue: QueuedStatement[] = []

  constructor(private readonly client: HttpClient) {}

  push(text: string, parameters: StatementParameters = {}, tag?: string): void {
    this.queue.push({ statement: text, parameters, tag })
  }

  size(): number {
    return this.queue.length
  }

  async run(): Promise<ResultCollection> {
    const collection = new ResultCollection()
    if (this.queue.length === 0) return collection

    for (const result of await this.client.commit(this.queue)) {
      collection.add(result)
    }
    return collection
  }
}

/**
 * Opens the server transaction on the first statement.
 */
class HttpTransaction implements Transaction {
  private location: string | null = null
  private open = true

  constructor(private readonly client: HttpClient) {}

  async run(statement: string, parameters: StatementParameters = {}, tag?: string): Promise<QueryResult> {
    this.assertOpen()
    const statements = [{ statement, parameters, tag }]
    try {
      const url = this.location ?? this.client.transactionEndpoint
      const { body, location } = await this.client.send("POST", url, statements)
      if (!this.location) {
        if (!location) {
          throw new DriverFailureError("Server did not return a transaction location", "Http.InvalidResponse")
        }
        this.location = location
      }
      const [result] = this.client.toResults(body, statements)
      return result ?? QueryResult.fromRows([], [], {}, tag)
    } catch (error) {
      // The server rolls back a transaction whose statement failed.
      this.open = false
      throw error
    }
  }

  async commit(): Promise<void> {
    this.assertOpen()
    this.open = false
    if (this.location) {
      await this.client.send("POST", `${this.location}/commit`, [])
    }
  }

  async rollback(): Promise<void> {
    this.assertOpen()
    this.open = false
    if (this.location) {
      await this.client.send("DELETE", this.location, [])
    }
  }

  isOpen(): boolean {
    return this.open
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new DriverFailureError("Transaction is already closed", "Http.TransactionClosed")
    }
  }
}

class HttpSession implements SessionHandle {
  constructor(private readonly client: HttpClient) {}

  async run(statement: string, parameters: StatementParameters, tag?: string): Promise<QueryResult> {
    const statements = [{ statement, parameters, tag }]
    const [result] = await this.client.commit(statements)
    return result ?? QueryResult.fromRows([], [], {}, tag)
  }

  createPipeline(query?: string, parameters: StatementParameters = {}, tag?: string): Pipeline {
    const pipeline = new HttpPipeline(this.client)
    if (query) {
      pipeline.push(query, parameters, tag)
    }
    return pipeline
  }

  transaction(): Transaction {
    return new HttpTransaction(this.client)
  }

  async close(): Promise<void> {
    // stateless
  }
}

/**
 * Driver handle over the transactional HTTP endpoint.
 */
export class HttpDriver implements DriverHandle {
  readonly name = "http"
  private readonly client: HttpClient

  constructor(uri: string, configuration: ConnectionConfiguration = {}, options: HttpDriverOptions = {}) {
    this.client = new HttpClient(uri, configuration, options.fetch ?? ((input, init) => fetch(input, init)))
  }

  get address(): string {
    return this.client.base
  }

  session(): SessionHandle {
    return new HttpSession(this.client)
  }

  async close(): Promise<void> {
    // no pooled connections to release
  }
}
