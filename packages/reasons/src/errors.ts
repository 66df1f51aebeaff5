/**
 * Routing rejections.
 * Each error wraps a ReasonDetail and carries the offending addresses as typed fields,
 * so callers can switch on `kind` (or `reason.disposition`) instead of parsing messages.
 */
import { AddressViolation, Disposition, ReasonDetail } from '@addrnet/dto'
import { reason } from './factory'
import { codeForViolation } from './registry'

export type RejectionKind = 'InvalidConfiguration' | 'InvalidAddress' | 'SelfRoute' | 'TopLevelRouter'

export abstract class RoutingRejection extends Error {
  public abstract readonly kind: RejectionKind
  public readonly reason: ReasonDetail

  protected constructor(detail: ReasonDetail, human?: string) {
    super(human ?? detail.message)
    this.reason = detail
  }

  get disposition(): Disposition {
    return this.reason.disposition
  }
}

export class InvalidConfigurationError extends RoutingRejection {
  public readonly kind = 'InvalidConfiguration' as const
  public readonly field: string

  constructor(field: string, human?: string, missing = true) {
    const code = missing ? 'CONFIG_MISSING_VALUE' : 'CONFIG_INVALID_VALUE'
    super(reason(code, { context: { field } }), human ?? `Invalid configuration for [${field}]`)
    this.name = 'InvalidConfigurationError'
    this.field = field
  }
}

export class InvalidAddressError extends RoutingRejection {
  public readonly kind = 'InvalidAddress' as const
  public readonly address: string
  public readonly rootAddress: string
  public readonly violation: AddressViolation

  constructor(address: string, rootAddress: string, violation: AddressViolation) {
    super(
      reason(codeForViolation(violation), { context: { address, rootAddress } }),
      `Invalid application address [${address}]. A valid address must begin with the root token: [${rootAddress}]`
    )
    this.name = 'InvalidAddressError'
    this.address = address
    this.rootAddress = rootAddress
    this.violation = violation
  }
}

export class SelfRouteError extends RoutingRejection {
  public readonly kind = 'SelfRoute' as const
  public readonly destination: string
  public readonly routerAddress: string

  constructor(destination: string, routerAddress: string) {
    super(
      reason('ROUTE_SELF', { context: { destination, routerAddress } }),
      `Destination address [${destination}] points to the [${routerAddress}] router address`
    )
    this.name = 'SelfRouteError'
    this.destination = destination
    this.routerAddress = routerAddress
  }
}

export class TopLevelRouterError extends RoutingRejection {
  public readonly kind = 'TopLevelRouter' as const
  public readonly routerAddress: string
  public readonly rootAddress: string
  public readonly destination?: string

  constructor(routerAddress: string, rootAddress: string, destination?: string) {
    const context: Record<string, string> = { routerAddress, rootAddress }
    if (destination !== undefined) context.destination = destination
    super(
      reason('ROUTE_TOP_LEVEL', { context }),
      `Cannot obtain a gateway address for the top-level router [${routerAddress}]. Check destination address.`
    )
    this.name = 'TopLevelRouterError'
    this.routerAddress = routerAddress
    this.rootAddress = rootAddress
    this.destination = destination
  }
}

export type RoutingError = InvalidConfigurationError | InvalidAddressError | SelfRouteError | TopLevelRouterError

export function isRoutingRejection(err: unknown): err is RoutingError {
  return err instanceof RoutingRejection
}
