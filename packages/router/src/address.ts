/**
 * address.ts
 * Parsing and structural validation of hierarchical application addresses; pure functions only.
 */
import { AddressViolation } from '@addrnet/dto'
import { InvalidAddressError } from '@addrnet/reasons'

export const DEFAULT_ROOT_ADDRESS = 'ke.go.health'

export const ADDRESS_SEPARATOR = '.'

const TOKEN_PATTERN = /^[a-zA-Z0-9_]*$/

export type AddressCheck =
  | { valid: true }
  | { valid: false; violation: AddressViolation }

/**
 * tokenize
 * Splits on every dot and keeps empty tokens, so `a..b` and `a.b.` surface as malformed.
 */
export function tokenize(address: string): string[] {
  return address.split(ADDRESS_SEPARATOR)
}

function checkTokens(address: string): AddressCheck {
  for (const token of tokenize(address)) {
    if (token === '') return { valid: false, violation: 'EMPTY_TOKEN' }
    if (!TOKEN_PATTERN.test(token)) return { valid: false, violation: 'ILLEGAL_TOKEN' }
  }
  return { valid: true }
}

/**
 * checkAddress
 * An address is valid when it is at least as long as the root, is the root itself or
 * continues it at a dot boundary, and is made only of non-empty [a-zA-Z0-9_] tokens.
 * Rules are checked in that order; the first failure is reported.
 */
export function checkAddress(address: string, rootAddress: string): AddressCheck {
  if (address.length < rootAddress.length) return { valid: false, violation: 'TOO_SHORT' }
  if (address !== rootAddress && !address.startsWith(rootAddress + ADDRESS_SEPARATOR)) {
    return { valid: false, violation: 'NOT_ROOTED' }
  }
  return checkTokens(address)
}

export function validateAddress(address: string, rootAddress: string): void {
  const res = checkAddress(address, rootAddress)
  if (!res.valid) throw new InvalidAddressError(address, rootAddress, res.violation)
}

export function validateRootAddress(rootAddress: string): void {
  const res = checkTokens(rootAddress)
  if (!res.valid) throw new InvalidAddressError(rootAddress, rootAddress, res.violation)
}

export function isValidAddress(address: string, rootAddress: string): boolean {
  return checkAddress(address, rootAddress).valid
}

/** True when `address` lies strictly below `ancestor`, compared token by token. */
export function isAncestorOf(ancestor: string, address: string): boolean {
  return address.startsWith(ancestor + ADDRESS_SEPARATOR)
}

/** The address one level up, or undefined for a single-token address. */
export function parentAddress(address: string): string | undefined {
  const tokens = tokenize(address)
  if (tokens.length < 2) return undefined
  return tokens.slice(0, -1).join(ADDRESS_SEPARATOR)
}
