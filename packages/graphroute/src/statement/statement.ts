/**
 * Statement Types
 *
 * Values queued for `Connection.runMixed` and `ConnectionManager.runStack`.
 */

import type { StatementParameters } from "../driver"

/**
 * A single Cypher statement with its parameters and an optional tag.
 */
export class Statement {
  private constructor(
    readonly text: string,
    readonly parameters: Readonly<StatementParameters>,
    readonly tag?: string,
  ) {}

  static create(text: string, parameters: StatementParameters = {}, tag?: string): Statement {
    return new Statement(text, { ...parameters }, tag)
  }
}

/**
 * An ordered batch of statements, optionally bound to a connection alias.
 *
 * @example
 * ```typescript
 * const stack = StatementStack.create('import', 'primary')
 * stack.push('MATCH (n:User) RETURN count(n)')
 * stack.pushWrite('CREATE (:User {name: $name})', { name: 'Ada' })
 * await manager.runStack(stack)
 * ```
 */
export class StatementStack {
  private readonly entries: Statement[] = []
  private writes = false

  private constructor(
    readonly tag?: string,
    readonly connectionAlias?: string,
  ) {}

  static create(tag?: string, connectionAlias?: string): StatementStack {
    return new StatementStack(tag, connectionAlias)
  }

  push(text: string, parameters: StatementParameters = {}, tag?: string): this {
    this.entries.push(Statement.create(text, parameters, tag))
    return this
  }

  /**
   * Push a statement and mark the stack as writing, so that it runs on a
   * write server.
   */
  pushWrite(text: string, parameters: StatementParameters = {}, tag?: string): this {
    this.writes = true
    return this.push(text, parameters, tag)
  }

  statements(): Statement[] {
    return [...this.entries]
  }

  size(): number {
    return this.entries.length
  }

  hasWrites(): boolean {
    return this.writes
  }
}
