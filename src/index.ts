export {
  Disposition,
  ReasonCategory,
  RouteDirection,
  SubtreeMatch,
  type AddressViolation,
  type ReasonCode,
  type RouteDecision,
} from '@addrnet/dto'
export * from '@addrnet/reasons'
export * from '@addrnet/router'
export { loadConfig, loadEnvFile, type RouterConfig } from './config'
export { createLogSink, logRejection, setLogger } from './utils/logger'
export { run, parseArgs } from './main'
