/**
 * graphroute In-Memory Cluster
 *
 * Zero-infrastructure stand-in for a routed cluster, for tests and local
 * development.
 *
 * @example
 * ```typescript
 * import { Connection } from 'graphroute';
 * import { InMemoryCluster } from 'graphroute-memory';
 *
 * const cluster = new InMemoryCluster({
 *   members: [
 *     { address: 'core1:7687', role: 'WRITE' },
 *     { address: 'replica1:7687', role: 'READ' },
 *   ],
 * });
 * cluster.on('RETURN n.name', { keys: ['n.name'], rows: [['Ada']] });
 *
 * const connection = await Connection.open('test', 'bolt+routing://seed:7687', {}, {
 *   driverFactory: cluster.driverFactory(),
 * });
 * await connection.run('MATCH (n) RETURN n.name');
 * cluster.executionsOn('replica1:7687'); // [{ statement: 'MATCH (n) RETURN n.name', ... }]
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// CLUSTER
// =============================================================================

export { InMemoryCluster } from "./cluster"
export type {
  ClusterMember,
  MemberRole,
  CannedResponse,
  Responder,
  ExecutionContext,
  ExecutionRecord,
  BuildRecord,
  InMemoryClusterConfig,
} from "./cluster"

// =============================================================================
// DRIVER (for advanced use cases)
// =============================================================================

export { InMemoryDriver, InMemorySession, InMemoryTransaction, createInMemoryDriver } from "./driver"
