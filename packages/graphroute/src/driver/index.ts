/**
 * Driver Module
 *
 * Collaborator contract, result types and the bundled bolt/http drivers.
 */

export type {
  DriverHandle,
  SessionHandle,
  Pipeline,
  Transaction,
  StatementParameters,
  Credentials,
  BoltSettings,
  DriverFactory,
} from "./types"

export { QueryResult, ResultRecord, ResultCollection } from "./result"
export type { ResultSummary } from "./result"

export {
  DefaultDriverFactory,
  PLACEHOLDER_CREDENTIALS,
  boltSettingsFor,
  buildInitialDriver,
} from "./factory"
export type { InitialDriver } from "./factory"

export { BoltDriver, boltUrl, boltConfig } from "./bolt"
export { HttpDriver, DEFAULT_HTTP_DATABASE } from "./http"
export type { HttpDriverOptions, FetchLike } from "./http"
