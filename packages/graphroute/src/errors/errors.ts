/**
 * Custom Error Classes
 */

/**
 * Base error for everything raised by the connection and routing layer.
 */
export class GraphRouteError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphRouteError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Connection error.
 * Thrown when a connection string cannot be turned into a driver.
 */
export class ConnectionError extends GraphRouteError {
  constructor(
    message: string,
    public readonly uri?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "ConnectionError"
  }
}

/**
 * Thrown when the URI scheme is neither bolt nor http.
 */
export class UnsupportedSchemeError extends ConnectionError {
  constructor(
    uri: string,
    public readonly scheme: string,
  ) {
    super(`Unable to build a driver from uri "${uri}": unsupported scheme "${scheme}"`, uri)
    this.name = "UnsupportedSchemeError"
  }
}

/**
 * Configuration error.
 * Thrown when connection configuration fails validation.
 */
export class ConfigurationError extends GraphRouteError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message)
    this.name = "ConfigurationError"
  }
}

/**
 * Routing discovery error.
 * The cluster routing table could not be fetched or had an unexpected shape.
 */
export class RoutingDiscoveryError extends GraphRouteError {
  constructor(message: string, cause?: Error) {
    super(message, cause)
    this.name = "RoutingDiscoveryError"
  }
}

/**
 * Thrown when a server has to be picked from an empty pool.
 */
export class RoutingExhaustedError extends GraphRouteError {
  constructor(
    public readonly mode: string,
    public readonly poolSize: number = 0,
  ) {
    super(`No ${mode} server available to route to (pool size ${poolSize})`)
    this.name = "RoutingExhaustedError"
  }
}

/**
 * Thrown for an empty or missing statement.
 */
export class InvalidStatementError extends GraphRouteError {
  constructor(public readonly received: unknown) {
    super(`Expected a non-empty Cypher statement, got "${String(received)}"`)
    this.name = "InvalidStatementError"
  }
}

/**
 * Failure reported by a driver adapter.
 * Carries the server's status code (e.g. `Neo.ClientError.Statement.SyntaxError`).
 */
export class DriverFailureError extends GraphRouteError {
  constructor(
    message: string,
    public readonly statusCode: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "DriverFailureError"
  }
}

/**
 * Execution error.
 * Thrown when statement execution fails on the server.
 */
export class ExecutionError extends GraphRouteError {
  constructor(
    message: string,
    public readonly statusCode: string,
    public readonly statement?: string,
    public readonly parameters?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "ExecutionError"
  }

  static fromDriverFailure(
    failure: DriverFailureError,
    statement?: string,
    parameters?: Record<string, unknown>,
  ): ExecutionError {
    return new ExecutionError(failure.message, failure.statusCode, statement, parameters, failure)
  }
}

/**
 * Alias error.
 * Thrown when using an unregistered alias or duplicate alias.
 */
export class AliasError extends GraphRouteError {
  constructor(
    message: string,
    public readonly alias: string,
    public readonly availableAliases?: string[],
  ) {
    super(message)
    this.name = "AliasError"
  }
}
