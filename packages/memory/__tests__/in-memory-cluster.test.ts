/**
 * In-Memory Cluster Tests
 */

import { describe, it, expect, beforeEach } from "vitest"
import { DriverFailureError, PLACEHOLDER_CREDENTIALS, ROUTING_TABLE_QUERY } from "graphroute"
import { InMemoryCluster, InMemoryTransaction, createInMemoryDriver } from "../src"

describe("InMemoryCluster", () => {
  let cluster: InMemoryCluster

  beforeEach(() => {
    cluster = new InMemoryCluster({
      members: [
        { address: "core1:7687", role: "WRITE" },
        { address: "replica1:7687", role: "READ" },
      ],
    })
  })

  describe("routing table", () => {
    it("should answer the routing query with its members grouped by role", async () => {
      cluster.addMember("router:7687", "ROUTE")
      const session = createInMemoryDriver(cluster, "seed:7687").session()

      const result = await session.run(ROUTING_TABLE_QUERY, {})

      expect(result.firstRecord()?.keys).toEqual(["ttl", "servers"])
      expect(result.firstRecord()?.values()).toEqual([
        300,
        [
          { role: "WRITE", addresses: ["core1:7687"] },
          { role: "READ", addresses: ["replica1:7687"] },
          { role: "ROUTE", addresses: ["router:7687"] },
        ],
      ])
    })

    it("should leave out roles without members", async () => {
      const empty = new InMemoryCluster({ ttl: 60 }).addMember("core1:7687", "WRITE")

      const result = await createInMemoryDriver(empty).session().run(ROUTING_TABLE_QUERY, {})

      expect(result.firstRecord()?.values()).toEqual([60, [{ role: "WRITE", addresses: ["core1:7687"] }]])
    })

    it("should use a replacement routing answer", async () => {
      cluster.respondToRoutingWith({ keys: ["ttl", "servers"], rows: [] })

      const result = await createInMemoryDriver(cluster).session().run(ROUTING_TABLE_QUERY, {})

      expect(result.size()).toBe(0)
    })
  })

  describe("responses", () => {
    it("should answer with the latest matching responder", async () => {
      cluster.on("RETURN n.name", { keys: ["n.name"], rows: [["Ada"]] })
      cluster.on(/RETURN n\.name LIMIT/, { keys: ["n.name"], rows: [["Grace"]] })
      const session = createInMemoryDriver(cluster, "replica1:7687").session()

      const all = await session.run("MATCH (n) RETURN n.name", {})
      const limited = await session.run("MATCH (n) RETURN n.name LIMIT 1", {})

      expect(all.firstRecord()?.get("n.name")).toBe("Ada")
      expect(limited.firstRecord()?.get("n.name")).toBe("Grace")
      expect(limited.summary.server?.address).toBe("replica1:7687")
    })

    it("should pass the execution context to a responder function", async () => {
      cluster.on("RETURN $name", ({ address, parameters }) => ({
        keys: ["address", "name"],
        rows: [[address, parameters.name]],
      }))

      const result = await createInMemoryDriver(cluster, "core1:7687")
        .session()
        .run("RETURN $name", { name: "Ada" }, "echo")

      expect(result.firstRecord()?.toObject()).toEqual({ address: "core1:7687", name: "Ada" })
      expect(result.tag).toBe("echo")
    })

    it("should answer unknown statements with an empty result", async () => {
      const result = await createInMemoryDriver(cluster).session().run("MATCH (n) RETURN n", {})

      expect(result.size()).toBe(0)
    })

    it("should fail statements with a status code", async () => {
      cluster.failOn("RETRUN", "Neo.ClientError.Statement.SyntaxError")
      const session = createInMemoryDriver(cluster).session()

      await expect(session.run("MATCH (n) RETRUN n", {})).rejects.toThrow(DriverFailureError)
      await expect(session.run("MATCH (n) RETRUN n", {})).rejects.toMatchObject({
        statusCode: "Neo.ClientError.Statement.SyntaxError",
        message: "Statement failed: Neo.ClientError.Statement.SyntaxError",
      })
      expect(cluster.executions).toHaveLength(2)
    })
  })

  describe("recording", () => {
    it("should record builds, sessions and closed drivers", async () => {
      const factory = cluster.driverFactory()
      const settings = { credentials: { ...PLACEHOLDER_CREDENTIALS }, encrypted: false, scheme: "bolt", configuration: {} }

      const bolt = factory.bolt("core1:7687", settings)
      factory.http("http://localhost:7474", { database: "movies" })
      bolt.session()
      bolt.session()
      await bolt.close()

      expect(cluster.buildLog).toEqual([
        { kind: "bolt", address: "core1:7687", settings },
        { kind: "http", address: "http://localhost:7474", configuration: { database: "movies" } },
      ])
      expect(cluster.boltAddresses()).toEqual(["core1:7687"])
      expect(cluster.sessionsOpened.get("core1:7687")).toBe(2)
      expect(cluster.closedDrivers).toEqual(["core1:7687"])
      expect(bolt.name).toBe("in-memory-bolt")
    })

    it("should record how each statement arrived", async () => {
      const session = createInMemoryDriver(cluster, "core1:7687").session()

      await session.run("MATCH (a) RETURN a", {})
      const pipeline = session.createPipeline("MATCH (b) RETURN b")
      pipeline.push("MATCH (c) RETURN c", { id: 3 }, "c")
      await pipeline.run()
      await session.transaction().run("CREATE (d)")

      expect(cluster.executionsOn("core1:7687")).toEqual([
        { statement: "MATCH (a) RETURN a", parameters: {}, tag: undefined, address: "core1:7687", via: "session" },
        { statement: "MATCH (b) RETURN b", parameters: {}, tag: undefined, address: "core1:7687", via: "pipeline" },
        { statement: "MATCH (c) RETURN c", parameters: { id: 3 }, tag: "c", address: "core1:7687", via: "pipeline" },
        { statement: "CREATE (d)", parameters: {}, tag: undefined, address: "core1:7687", via: "transaction" },
      ])
      expect(cluster.executionsOn("replica1:7687")).toEqual([])
    })
  })

  describe("transactions", () => {
    it("should close on commit", async () => {
      const transaction = new InMemoryTransaction(cluster, "core1:7687")

      await transaction.run("CREATE (n)")
      await transaction.commit()

      expect(transaction.outcome).toBe("committed")
      expect(transaction.isOpen()).toBe(false)
      await expect(transaction.run("CREATE (m)")).rejects.toThrow("Transaction already committed")
    })

    it("should close on rollback", async () => {
      const transaction = new InMemoryTransaction(cluster, "core1:7687")

      await transaction.rollback()

      expect(transaction.outcome).toBe("rolledBack")
      await expect(transaction.commit()).rejects.toThrow("Transaction already rolledBack")
    })
  })
})
