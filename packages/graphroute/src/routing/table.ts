/**
 * Routing Table
 *
 * Cached cluster membership for one connection plus the discovery query that
 * fills it. Membership is fetched once and never refreshed.
 */

import { z } from "zod"
import type { BoltSettings, ResultRecord, SessionHandle } from "../driver"
import { RoutingDiscoveryError } from "../errors"
import { RoutingMode } from "./mode"

export const ROUTING_TABLE_QUERY = "CALL dbms.routing.getRoutingTable({})"

const serverDescriptorSchema = z.object({
  role: z.string(),
  addresses: z.array(z.string()),
})

const serversSchema = z.array(serverDescriptorSchema)

export type ServerDescriptor = z.infer<typeof serverDescriptorSchema>

/**
 * Addresses grouped by role.
 */
export interface RoutingTable {
  writeServers: string[]
  readServers: string[]
}

/**
 * Routing state owned by a connection.
 */
export class RoutingState {
  private table: RoutingTable = { writeServers: [], readServers: [] }
  private config: BoltSettings | null = null
  private mode: RoutingMode = RoutingMode.Unset

  get enabled(): boolean {
    return this.config !== null
  }

  get lastMode(): RoutingMode {
    return this.mode
  }

  get writeServers(): readonly string[] {
    return this.table.writeServers
  }

  get readServers(): readonly string[] {
    return this.table.readServers
  }

  /**
   * Settings used to build routed drivers.
   */
  get routingConfig(): BoltSettings | null {
    return this.config
  }

  /**
   * Store a discovered table and turn routing on.
   */
  enable(table: RoutingTable, config: BoltSettings): void {
    this.table = { writeServers: [...table.writeServers], readServers: [...table.readServers] }
    this.config = config
  }

  /**
   * Record the mode the connection now points at. Never goes back to unset.
   */
  markMode(mode: RoutingMode.Read | RoutingMode.Write): void {
    this.mode = mode
  }

  servers(mode: RoutingMode.Read | RoutingMode.Write): readonly string[] {
    return mode === RoutingMode.Write ? this.table.writeServers : this.table.readServers
  }
}

/**
 * Partition server descriptors by role. Roles other than WRITE and READ
 * (ROUTE) are ignored.
 */
export function partitionServers(servers: readonly ServerDescriptor[]): RoutingTable {
  const table: RoutingTable = { writeServers: [], readServers: [] }

  for (const server of servers) {
    if (server.role === RoutingMode.Write) {
      table.writeServers.push(...server.addresses)
    } else if (server.role === RoutingMode.Read) {
      table.readServers.push(...server.addresses)
    }
  }

  return table
}

/**
 * Fetch the cluster routing table through a session.
 *
 * @throws RoutingDiscoveryError when the query fails or the result is not a
 * routing table
 */
export async function discoverRoutingTable(session: SessionHandle): Promise<RoutingTable> {
  let record: ResultRecord | undefined
  try {
    const result = await session.run(ROUTING_TABLE_QUERY, {})
    record = result.firstRecord()
  } catch (error) {
    throw new RoutingDiscoveryError(
      "Routing table discovery failed",
      error instanceof Error ? error : undefined,
    )
  }

  if (!record) {
    throw new RoutingDiscoveryError("Routing table discovery returned no record")
  }

  const values = record.values()
  const parsed = serversSchema.safeParse(values[1])
  if (!parsed.success) {
    throw new RoutingDiscoveryError("Routing table record has an unexpected shape", parsed.error)
  }

  return partitionServers(parsed.data)
}
