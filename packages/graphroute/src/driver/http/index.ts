export { HttpDriver, DEFAULT_HTTP_DATABASE } from "./driver"
export type { HttpDriverOptions, FetchLike } from "./driver"
