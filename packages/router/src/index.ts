/**
 * Router public surface. Pure, side-effect free apart from the injected log sink.
 */
export * from './address'
export * from './channel'
export * from './logSink'
export * from './AddressRouter'
