/**
 * Errors Module
 */

export {
  GraphRouteError,
  ConnectionError,
  UnsupportedSchemeError,
  ConfigurationError,
  RoutingDiscoveryError,
  RoutingExhaustedError,
  InvalidStatementError,
  DriverFailureError,
  ExecutionError,
  AliasError,
} from "./errors"
