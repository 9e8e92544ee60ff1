/**
 * Driver Slot
 *
 * The current driver of a connection and the session lazily opened on it.
 * Replacing the driver always drops the session, so the next operation opens
 * a fresh one on the new driver.
 */

import type { DriverHandle, SessionHandle } from "../driver"
import type { Logger } from "../utils"

export class DriverSlot {
  private current: DriverHandle
  private session: SessionHandle | null = null

  constructor(
    driver: DriverHandle,
    private readonly logger: Logger,
  ) {
    this.current = driver
  }

  get driver(): DriverHandle {
    return this.current
  }

  get hasSession(): boolean {
    return this.session !== null
  }

  /**
   * Return the held session, opening one on the current driver if needed.
   */
  ensureSession(): SessionHandle {
    if (!this.session) {
      this.session = this.current.session()
      this.logger.debug({ driver: this.current.name, address: this.current.address }, "session opened")
    }
    return this.session
  }

  /**
   * Swap in a new driver, then release the previous session and driver.
   * A failure to release them is logged; the swap itself always succeeds.
   */
  async replaceDriver(next: DriverHandle): Promise<void> {
    const previous = this.current
    const session = this.session

    this.current = next
    this.session = null

    if (session) {
      await this.release(() => session.close(), previous, "session")
    }
    if (previous !== next) {
      await this.release(() => previous.close(), previous, "driver")
    }
  }

  private async release(close: () => Promise<void>, driver: DriverHandle, resource: string): Promise<void> {
    try {
      await close()
    } catch (error) {
      this.logger.warn({ err: error, address: driver.address, resource }, "failed to release replaced driver")
    }
  }

  /**
   * Close the session and the driver. The driver is closed even when
   * closing the session fails.
   */
  async close(): Promise<void> {
    const session = this.session
    this.session = null
    try {
      if (session) {
        await session.close()
      }
    } finally {
      await this.current.close()
    }
  }
}
