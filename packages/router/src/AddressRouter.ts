import { RouteDecision, RouteDirection, SubtreeMatch } from '@addrnet/dto'
import { InvalidConfigurationError, SelfRouteError, TopLevelRouterError } from '@addrnet/reasons'
import {
  ADDRESS_SEPARATOR,
  DEFAULT_ROOT_ADDRESS,
  isAncestorOf,
  parentAddress,
  tokenize,
  validateAddress,
  validateRootAddress,
} from './address'
import { ChannelNamer, channelName as defaultChannelName } from './channel'
import { RouterLogSink, noopLogSink } from './logSink'

export interface AddressRouterOptions {
  routerAddress: string
  rootAddress?: string
  logSink?: RouterLogSink
  channelNamer?: ChannelNamer
  subtreeMatch?: SubtreeMatch
}

/**
 * AddressRouter
 * Decides the single next hop for a destination address: up to the gateway (parent router)
 * when the destination is outside this router's subtree, otherwise down exactly one level
 * toward it. Configuration is fixed at construction; every decision is independent.
 */
export class AddressRouter {
  readonly rootAddress: string
  readonly routerAddress: string
  readonly subtreeMatch: SubtreeMatch
  private readonly log: RouterLogSink
  private readonly namer: ChannelNamer

  constructor(options: AddressRouterOptions) {
    if (!options.routerAddress) {
      throw new InvalidConfigurationError('routerAddress', 'Router cannot be initialized with a null or empty router address.')
    }
    this.rootAddress = options.rootAddress ?? DEFAULT_ROOT_ADDRESS
    this.routerAddress = options.routerAddress
    this.subtreeMatch = options.subtreeMatch ?? SubtreeMatch.PREFIX
    this.log = options.logSink ?? noopLogSink
    this.namer = options.channelNamer ?? defaultChannelName

    validateRootAddress(this.rootAddress)
    validateAddress(this.routerAddress, this.rootAddress)
    this.log.info(`Initialized new router with address ${this.routerAddress}`, {
      event: 'router.init',
      routerAddress: this.routerAddress,
      rootAddress: this.rootAddress,
    })
  }

  /**
   * Same router identity under a different root. The current instance is left untouched,
   * so it stays safe to share while the new one is validated and put into service.
   */
  withRootAddress(rootAddress: string): AddressRouter {
    return new AddressRouter({
      routerAddress: this.routerAddress,
      rootAddress,
      logSink: this.log,
      channelNamer: this.namer,
      subtreeMatch: this.subtreeMatch,
    })
  }

  validate(address: string): void {
    validateAddress(address, this.rootAddress)
  }

  validateDestination(destination: string): void {
    this.validate(destination)
    if (destination === this.routerAddress) {
      throw new SelfRouteError(destination, this.routerAddress)
    }
  }

  channelName(address: string): string {
    return this.namer(address)
  }

  /** Name of the channel the message for `destination` should leave on. */
  dispatchTo(destination: string): string {
    return this.decide(destination).channel
  }

  decide(destination: string): RouteDecision {
    this.validateDestination(destination)
    this.log.info(`Dispatching to destination address: ${destination}`, { event: 'router.dispatch', destination })

    if (!this.isWithinSubtree(destination)) {
      const nextHopAddress = this.gatewayAddress(destination)
      const channel = this.channelName(nextHopAddress)
      this.log.info(`Routing up to: ${channel}`, { event: 'router.route', direction: RouteDirection.GATEWAY, destination, channel })
      return { direction: RouteDirection.GATEWAY, destination, nextHopAddress, channel }
    }

    const nearbyToken = destination.substring(this.routerAddress.length + 1)
    this.log.info(`Nearby token is: ${nearbyToken}`, { event: 'router.nearby_token', nearbyToken })
    const nextHopAddress = this.routerAddress + ADDRESS_SEPARATOR + tokenize(nearbyToken)[0]
    const channel = this.channelName(nextHopAddress)
    this.log.info(`Routing down to: ${channel}`, { event: 'router.route', direction: RouteDirection.DOWNSTREAM, destination, channel })
    return { direction: RouteDirection.DOWNSTREAM, destination, nextHopAddress, channel }
  }

  /**
   * Parent of this router in the address tree. A top-level router has none, which makes
   * any destination that needs it unroutable from here.
   */
  gatewayAddress(destination?: string): string {
    const parent = this.routerAddress === this.rootAddress ? undefined : parentAddress(this.routerAddress)
    if (parent === undefined) {
      throw new TopLevelRouterError(this.routerAddress, this.rootAddress, destination)
    }
    return parent
  }

  // PREFIX compares the leading characters only: a router at `a.b.cou` treats `a.b.county1`
  // as its own descendant. TOKEN requires the match to end at a dot.
  private isWithinSubtree(destination: string): boolean {
    if (this.subtreeMatch === SubtreeMatch.TOKEN) {
      return isAncestorOf(this.routerAddress, destination)
    }
    if (destination.length < this.routerAddress.length) {
      this.log.info('Destination address shorter than router address. Routing up immediately.', { event: 'router.subtree', destination })
      return false
    }
    const routerToken = destination.substring(0, this.routerAddress.length)
    this.log.info(`Router token is: ${routerToken}`, { event: 'router.router_token', routerToken })
    return routerToken === this.routerAddress
  }
}
