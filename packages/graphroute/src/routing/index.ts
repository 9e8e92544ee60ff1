/**
 * Routing Module
 *
 * Read/write classification, server selection and routing-table discovery.
 */

export { RoutingMode } from "./mode"
export type { AccessMode, RouteOutcome } from "./mode"

export { classifyStatement, isWriteStatement, WRITE_KEYWORDS } from "./classifier"

export { createRandomSelector, createFixedSelector, randomSelector } from "./selector"
export type { ServerSelector } from "./selector"

export {
  RoutingState,
  ROUTING_TABLE_QUERY,
  discoverRoutingTable,
  partitionServers,
} from "./table"
export type { RoutingTable, ServerDescriptor } from "./table"

export { Router } from "./router"
export type { RouterOptions, RoutedDriverBuilder } from "./router"
