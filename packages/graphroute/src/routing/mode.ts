/**
 * Routing modes.
 */
export enum RoutingMode {
  /** No statement has been routed yet */
  Unset = "UNSET",
  Read = "READ",
  Write = "WRITE",
}

/**
 * Modes a statement can be classified as.
 */
export type AccessMode = RoutingMode.Read | RoutingMode.Write

/**
 * Outcome of a routing check.
 */
export type RouteOutcome = "switched" | "unchanged"
