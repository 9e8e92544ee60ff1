export { Statement, StatementStack } from "./statement"
