/**
 * Router
 *
 * Keeps a routed connection pointed at the right class of cluster member.
 * Before a statement runs the router classifies it; when the connection is on
 * the wrong class of server it picks a member of the right class, rebuilds the
 * driver against it and drops the session.
 */

import type { DriverSlot } from "../connection/driver-slot"
import type { BoltSettings, DriverHandle } from "../driver"
import { RoutingExhaustedError } from "../errors"
import type { Logger } from "../utils"
import { classifyStatement } from "./classifier"
import { RoutingMode, type AccessMode, type RouteOutcome } from "./mode"
import { randomSelector, type ServerSelector } from "./selector"
import type { RoutingState } from "./table"

/**
 * Builds a driver against a cluster member.
 */
export type RoutedDriverBuilder = (address: string, settings: BoltSettings) => DriverHandle

export interface RouterOptions {
  selector?: ServerSelector
  logger: Logger
}

export class Router {
  private readonly selector: ServerSelector
  private readonly logger: Logger

  constructor(
    private readonly state: RoutingState,
    private readonly slot: DriverSlot,
    private readonly build: RoutedDriverBuilder,
    options: RouterOptions,
  ) {
    this.selector = options.selector ?? randomSelector
    this.logger = options.logger
  }

  get enabled(): boolean {
    return this.state.enabled
  }

  get lastMode(): RoutingMode {
    return this.state.lastMode
  }

  /**
   * Check the statement against the current mode and switch servers if needed.
   *
   * @param statement - Statement about to run, or null when only forcing
   * @param forceMode - Mode to apply whatever the statement's classification
   */
  async route(statement: string | null, forceMode?: AccessMode): Promise<RouteOutcome> {
    const config = this.state.routingConfig
    if (!config) {
      return "unchanged"
    }

    const mode = statement !== null ? classifyStatement(statement) : undefined
    const lastMode = this.state.lastMode

    if (lastMode !== RoutingMode.Write && (mode === RoutingMode.Write || forceMode === RoutingMode.Write)) {
      await this.switchTo(RoutingMode.Write, config)
      return "switched"
    }

    if (lastMode !== RoutingMode.Read && (mode === RoutingMode.Read || forceMode === RoutingMode.Read)) {
      await this.switchTo(RoutingMode.Read, config)
      return "switched"
    }

    return "unchanged"
  }

  /**
   * Pick a server of the given class.
   *
   * @throws RoutingExhaustedError when the pool is empty or the selector
   * returns a position outside it
   */
  pick(mode: AccessMode): string {
    const pool = this.state.servers(mode)
    if (pool.length === 0) {
      throw new RoutingExhaustedError(mode, 0)
    }

    const position = this.selector.select(pool.length)
    const address = Number.isInteger(position) ? pool[position] : undefined
    if (address === undefined) {
      throw new RoutingExhaustedError(mode, pool.length)
    }
    return address
  }

  private async switchTo(mode: AccessMode, config: BoltSettings): Promise<void> {
    const address = this.pick(mode)
    const from = this.state.lastMode

    this.state.markMode(mode)
    await this.slot.replaceDriver(this.build(address, config))

    this.logger.debug({ from, to: mode, address, selector: this.selector.name }, "routing switched")
  }
}
