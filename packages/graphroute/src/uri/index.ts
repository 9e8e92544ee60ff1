export {
  resolveUri,
  schemeFamily,
  DEFAULT_BOLT_PORT,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTPS_PORT,
} from "./resolver"
export type { ResolvedUri, SchemeFamily } from "./resolver"
