export { connectionConfigurationSchema, parseConfiguration } from "./schema"
export type { ConnectionConfiguration } from "./schema"
