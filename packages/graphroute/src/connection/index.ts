/**
 * Connection Module
 */

export { Connection, normalizeParameters } from "./connection"
export type { ConnectionOptions, MixedQueueEntry } from "./connection"

export { ConnectionManager } from "./manager"
export { DriverSlot } from "./driver-slot"
