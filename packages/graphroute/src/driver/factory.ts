/**
 * Driver Factory
 *
 * Turns a resolved connection string into a driver handle.
 */

import type { ConnectionConfiguration } from "../config"
import { UnsupportedSchemeError } from "../errors"
import type { ResolvedUri } from "../uri"
import { BoltDriver } from "./bolt"
import { HttpDriver, type HttpDriverOptions } from "./http"
import type { BoltSettings, Credentials, DriverFactory, DriverHandle } from "./types"

/**
 * Credentials sent to bolt servers that run without authentication.
 */
export const PLACEHOLDER_CREDENTIALS: Readonly<Credentials> = Object.freeze({
  username: "null",
  password: "null",
})

/**
 * Factory producing the bundled bolt and http drivers.
 */
export class DefaultDriverFactory implements DriverFactory {
  constructor(private readonly httpOptions: HttpDriverOptions = {}) {}

  bolt(address: string, settings: BoltSettings): DriverHandle {
    return new BoltDriver(address, settings)
  }

  http(uri: string, configuration: ConnectionConfiguration): DriverHandle {
    return new HttpDriver(uri, configuration, this.httpOptions)
  }
}

/**
 * The initial driver of a connection and, for bolt, the settings it was built
 * with (reused for routed drivers).
 */
export interface InitialDriver {
  driver: DriverHandle
  boltSettings?: BoltSettings
}

/**
 * Bolt settings for a resolved uri: the uri's credentials with encryption
 * required, or placeholder credentials when the uri has none.
 */
export function boltSettingsFor(resolved: ResolvedUri, configuration: ConnectionConfiguration): BoltSettings {
  if (resolved.user !== undefined && resolved.password !== undefined) {
    return {
      credentials: { username: resolved.user, password: resolved.password },
      encrypted: true,
      scheme: resolved.scheme,
      configuration,
    }
  }

  return {
    credentials: { ...PLACEHOLDER_CREDENTIALS },
    encrypted: false,
    scheme: resolved.scheme,
    configuration,
  }
}

/**
 * Build the first driver of a connection.
 *
 * @throws UnsupportedSchemeError when the scheme is neither bolt nor http
 */
export function buildInitialDriver(
  resolved: ResolvedUri,
  configuration: ConnectionConfiguration,
  factory: DriverFactory,
): InitialDriver {
  switch (resolved.family) {
    case "bolt": {
      const boltSettings = boltSettingsFor(resolved, configuration)
      const driver = factory.bolt(`${resolved.host}:${resolved.port}`, boltSettings)
      return { driver, boltSettings }
    }
    case "http":
      return { driver: factory.http(resolved.uri, configuration) }
    default:
      throw new UnsupportedSchemeError(resolved.uri, resolved.scheme)
  }
}
