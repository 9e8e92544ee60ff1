/**
 * Server Selection
 *
 * A selector picks the index of the server to use from a pool of known size.
 * The router validates the pick, so a selector never has to deal with an
 * empty pool.
 */

/**
 * Picks an index in `[0, poolSize)`.
 */
export interface ServerSelector {
  readonly name: string
  select(poolSize: number): number
}

/**
 * Uniform random selection.
 *
 * @param random - Source of numbers in `[0, 1)`, `Math.random` by default
 */
export function createRandomSelector(random: () => number = Math.random): ServerSelector {
  return {
    name: "random",
    select: (poolSize) => Math.floor(random() * poolSize),
  }
}

/**
 * Always picks the same position. Useful for tests and pinned deployments.
 */
export function createFixedSelector(position: number): ServerSelector {
  return {
    name: `fixed(${position})`,
    select: () => position,
  }
}

export const randomSelector: ServerSelector = createRandomSelector()
