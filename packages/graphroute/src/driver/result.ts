/**
 * Result Types
 *
 * Driver-neutral records and results. Adapters convert their native records
 * into these so callers never see protocol-specific types.
 */

/**
 * One row of a result: ordered values addressed by position or column name.
 */
export class ResultRecord {
  private readonly index: Map<string, number>

  constructor(
    public readonly keys: readonly string[],
    private readonly fields: readonly unknown[],
  ) {
    this.index = new Map(keys.map((key, position) => [key, position]))
  }

  values(): unknown[] {
    return [...this.fields]
  }

  /**
   * Get a value by column name or position.
   */
  get(key: string | number): unknown {
    const position = typeof key === "number" ? key : this.index.get(key)
    if (position === undefined || position < 0 || position >= this.fields.length) {
      throw new RangeError(`Record has no field ${JSON.stringify(key)} (keys: ${this.keys.join(", ")})`)
    }
    return this.fields[position]
  }

  has(key: string): boolean {
    return this.index.has(key)
  }

  toObject(): Record<string, unknown> {
    const object: Record<string, unknown> = {}
    this.keys.forEach((key, position) => {
      object[key] = this.fields[position]
    })
    return object
  }
}

/**
 * Execution summary reported by the driver.
 */
export interface ResultSummary {
  /** Update statistics */
  counters?: Record<string, number>
  /** Server info */
  server?: {
    version?: string
    address?: string
  }
  /** Time to first result in ms */
  resultAvailableAfter?: number
}

/**
 * Result of one statement.
 */
export class QueryResult {
  constructor(
    private readonly rows: readonly ResultRecord[],
    public readonly summary: ResultSummary = {},
    public readonly tag?: string,
  ) {}

  records(): ResultRecord[] {
    return [...this.rows]
  }

  firstRecord(): ResultRecord | undefined {
    return this.rows[0]
  }

  size(): number {
    return this.rows.length
  }

  /**
   * Build a result from column names and row tuples.
   */
  static fromRows(
    keys: readonly string[],
    rows: readonly (readonly unknown[])[],
    summary?: ResultSummary,
    tag?: string,
  ): QueryResult {
    return new QueryResult(
      rows.map((row) => new ResultRecord(keys, row)),
      summary,
      tag,
    )
  }
}

/**
 * Results of a pipeline, in push order.
 */
export class ResultCollection implements Iterable<QueryResult> {
  private readonly items: QueryResult[] = []

  add(result: QueryResult): void {
    this.items.push(result)
  }

  results(): QueryResult[] {
    return [...this.items]
  }

  get(position: number): QueryResult | undefined {
    return this.items[position]
  }

  /**
   * First result pushed with the given tag.
   */
  getByTag(tag: string): QueryResult | undefined {
    return this.items.find((result) => result.tag === tag)
  }

  size(): number {
    return this.items.length
  }

  [Symbol.iterator](): Iterator<QueryResult> {
    return this.items[Symbol.iterator]()
  }
}
