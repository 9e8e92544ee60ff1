/**
 * Routing Scenarios
 *
 * End-to-end behaviour of routed connections against an in-memory cluster:
 * - Discovery through the seed address
 * - Reads on read members, writes on write members
 * - The reset to a write member after every run
 * - Error translation, pipelines and transactions on the current member
 */

import { describe, it, expect, beforeEach } from "vitest"
import {
  Connection,
  ConnectionManager,
  createFixedSelector,
  ExecutionError,
  RoutingDiscoveryError,
  RoutingMode,
  Statement,
  StatementStack,
  type ConnectionOptions,
} from "graphroute"
import { InMemoryCluster, InMemoryTransaction } from "../src"

const SEED = "bolt+routing://seed:7687"

describe("Routing scenarios", () => {
  let cluster: InMemoryCluster
  let options: ConnectionOptions

  beforeEach(() => {
    cluster = new InMemoryCluster({
      members: [
        { address: "core1:7687", role: "WRITE" },
        { address: "replica1:7687", role: "READ" },
        { address: "replica2:7687", role: "READ" },
        { address: "router:7687", role: "ROUTE" },
      ],
    })
    options = { driverFactory: cluster.driverFactory(), selector: createFixedSelector(0) }
  })

  it("should discover through the seed and settle on the write member", async () => {
    const connection = await Connection.open("cluster", SEED, {}, options)

    expect(cluster.executionsOn("seed:7687").map((record) => record.statement)).toEqual([
      "CALL dbms.routing.getRoutingTable({})",
    ])
    expect(cluster.boltAddresses()).toEqual(["seed:7687", "core1:7687"])
    expect(cluster.closedDrivers).toEqual(["seed:7687"])
    expect(connection.getRoutingTable()).toEqual({
      writeServers: ["core1:7687"],
      readServers: ["replica1:7687", "replica2:7687"],
    })
    expect(connection.getRoutingMode()).toBe(RoutingMode.Write)
  })

  it("should read from a read member and come back to the write member", async () => {
    cluster.on("RETURN u.name", { keys: ["u.name"], rows: [["Ada"]] })
    const connection = await Connection.open("cluster", SEED, {}, options)

    const result = await connection.run("MATCH (u:User) RETURN u.name")

    expect(result.firstRecord()?.get("u.name")).toBe("Ada")
    expect(result.summary.server?.address).toBe("replica1:7687")
    expect(cluster.boltAddresses()).toEqual(["seed:7687", "core1:7687", "replica1:7687", "core1:7687"])
    expect(cluster.closedDrivers).toEqual(["seed:7687", "core1:7687", "replica1:7687"])
    expect(cluster.sessionsOpened.get("replica1:7687")).toBe(1)
    expect(connection.getRoutingMode()).toBe(RoutingMode.Write)
  })

  it("should write to the write member without switching", async () => {
    const connection = await Connection.open("cluster", SEED, {}, options)

    await connection.run("CREATE (:User {name: $name})", { name: "Grace" })

    expect(cluster.executionsOn("core1:7687")).toEqual([
      {
        statement: "CREATE (:User {name: $name})",
        parameters: { name: "Grace" },
        tag: undefined,
        address: "core1:7687",
        via: "session",
      },
    ])
    expect(cluster.boltAddresses()).toHaveLength(2)
  })

  it("should route a mixed workload statement by statement", async () => {
    const connection = await Connection.open("cluster", SEED, {}, options)

    await connection.run("MATCH (n) RETURN count(n)")
    await connection.run("MERGE (n:Counter {id: 1})")
    await connection.run("MATCH (n:Counter) RETURN n")

    const reached = cluster.executions
      .filter((record) => record.address !== "seed:7687")
      .map((record) => `${record.address} ${record.statement}`)
    expect(reached).toEqual([
      "replica1:7687 MATCH (n) RETURN count(n)",
      "core1:7687 MERGE (n:Counter {id: 1})",
      "replica1:7687 MATCH (n:Counter) RETURN n",
    ])
  })

  it("should spread reads over every read member", async () => {
    const connection = await Connection.open("cluster", SEED, {}, { driverFactory: cluster.driverFactory() })

    for (let i = 0; i < 200; i++) {
      await connection.run("MATCH (n) RETURN n")
    }

    expect(cluster.executionsOn("replica1:7687").length).toBeGreaterThan(0)
    expect(cluster.executionsOn("replica2:7687").length).toBeGreaterThan(0)
    expect(cluster.executionsOn("core1:7687")).toHaveLength(0)
  })

  it("should keep the status code of a failed statement", async () => {
    cluster.failOn("RETRUN", "Neo.ClientError.Statement.SyntaxError", "Invalid input 'RETRUN'")
    const connection = await Connection.open("cluster", SEED, {}, options)

    await expect(connection.run("MATCH (n) RETRUN n")).rejects.toMatchObject({
      name: "ExecutionError",
      statusCode: "Neo.ClientError.Statement.SyntaxError",
      statement: "MATCH (n) RETRUN n",
    })
    expect(connection.getRoutingMode()).toBe(RoutingMode.Read)
  })

  it("should close the seed when the routing table is malformed", async () => {
    cluster.respondToRoutingWith({ keys: ["ttl", "servers"], rows: [[300, null]] })

    await expect(Connection.open("cluster", SEED, {}, options)).rejects.toThrow(RoutingDiscoveryError)
    expect(cluster.closedDrivers).toEqual(["seed:7687"])
  })

  it("should run pipelines and transactions on the current member", async () => {
    const connection = await Connection.open("cluster", SEED, {}, options)
    const stack = StatementStack.create("import").pushWrite("CREATE (a)").push("MATCH (a) RETURN a")

    const results = await connection.runMixed([stack, Statement.create("MATCH (b) RETURN b", {}, "b")])
    const transaction = connection.getTransaction()
    await transaction.run("CREATE (c)")
    await transaction.commit()

    expect(results.size()).toBe(3)
    expect(cluster.executionsOn("core1:7687").map((record) => record.via)).toEqual([
      "pipeline",
      "pipeline",
      "pipeline",
      "transaction",
    ])
    expect(transaction).toBeInstanceOf(InMemoryTransaction)
    expect(transaction.isOpen()).toBe(false)
  })

  it("should translate failures inside a pipeline", async () => {
    cluster.failOn("CREAT ", "Neo.ClientError.Statement.SyntaxError")
    const connection = await Connection.open("cluster", SEED, {}, options)

    await expect(connection.runMixed([Statement.create("CREAT (n)")])).rejects.toThrow(ExecutionError)
  })

  it("should serve several aliases from one manager", async () => {
    const manager = new ConnectionManager(options)
    await manager.register("cluster", SEED)
    await manager.register("web", "http://localhost:7474", { database: "movies" })

    await manager.run("MATCH (n) RETURN n", null, "reads", "cluster")
    await manager.run("MATCH (m) RETURN m", {}, undefined, "web")

    expect(cluster.buildLog.filter((entry) => entry.kind === "http")).toEqual([
      { kind: "http", address: "http://localhost:7474", configuration: { database: "movies" } },
    ])
    expect(cluster.executionsOn("replica1:7687").map((record) => record.tag)).toEqual(["reads"])
    expect(cluster.executionsOn("http://localhost:7474").map((record) => record.statement)).toEqual([
      "MATCH (m) RETURN m",
    ])

    await manager.close()
  })
})
