import { AddressViolation, Disposition, ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, disposition, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CONFIGURATION
  CONFIG_MISSING_VALUE: { code: 'CONFIG_MISSING_VALUE', category: ReasonCategory.CONFIGURATION, disposition: Disposition.ABORT, message: 'Required configuration value is missing or empty' },
  CONFIG_INVALID_VALUE: { code: 'CONFIG_INVALID_VALUE', category: ReasonCategory.CONFIGURATION, disposition: Disposition.ABORT, message: 'Configuration value is invalid' },

  // ADDRESS
  ADDRESS_TOO_SHORT: { code: 'ADDRESS_TOO_SHORT', category: ReasonCategory.ADDRESS, disposition: Disposition.REJECT, message: 'Address is shorter than the root address' },
  ADDRESS_NOT_ROOTED: { code: 'ADDRESS_NOT_ROOTED', category: ReasonCategory.ADDRESS, disposition: Disposition.REJECT, message: 'Address does not begin with the root address' },
  ADDRESS_EMPTY_TOKEN: { code: 'ADDRESS_EMPTY_TOKEN', category: ReasonCategory.ADDRESS, disposition: Disposition.REJECT, message: 'Address contains an empty token' },
  ADDRESS_ILLEGAL_TOKEN: { code: 'ADDRESS_ILLEGAL_TOKEN', category: ReasonCategory.ADDRESS, disposition: Disposition.REJECT, message: 'Address token contains characters other than letters, digits and underscores' },

  // ROUTING
  ROUTE_SELF: { code: 'ROUTE_SELF', category: ReasonCategory.ROUTING, disposition: Disposition.DELIVERED, message: 'Destination is this router; the message is already delivered' },
  ROUTE_TOP_LEVEL: { code: 'ROUTE_TOP_LEVEL', category: ReasonCategory.ROUTING, disposition: Disposition.UNROUTABLE, message: 'Top-level router has no gateway; destination is unreachable' },
}

export const VIOLATION_CODES: Record<AddressViolation, ReasonCode> = {
  TOO_SHORT: 'ADDRESS_TOO_SHORT',
  NOT_ROOTED: 'ADDRESS_NOT_ROOTED',
  EMPTY_TOKEN: 'ADDRESS_EMPTY_TOKEN',
  ILLEGAL_TOKEN: 'ADDRESS_ILLEGAL_TOKEN',
}
