export { BoltDriver, boltUrl, boltConfig } from "./driver"
