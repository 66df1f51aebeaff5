import {
  DEFAULT_ROOT_ADDRESS,
  checkAddress,
  isAncestorOf,
  isValidAddress,
  parentAddress,
  tokenize,
  validateAddress,
  validateRootAddress,
} from '../src/address'
import { channelName } from '../src/channel'
import { InvalidAddressError } from '@addrnet/reasons'

const ROOT = DEFAULT_ROOT_ADDRESS

function violationOf(fn: () => void): string | undefined {
  try {
    fn()
  } catch (e) {
    if (e instanceof InvalidAddressError) return e.violation
    throw e
  }
  return undefined
}

describe('address validation', () => {
  it('accepts the root and addresses below it', () => {
    expect(checkAddress(ROOT, ROOT)).toEqual({ valid: true })
    expect(checkAddress('ke.go.health.county1.facility1', ROOT)).toEqual({ valid: true })
    expect(isValidAddress('ke.go.health.cou_nty1', ROOT)).toBe(true)
  })

  it('reports each violation in rule order', () => {
    expect(checkAddress('ke.go', ROOT)).toEqual({ valid: false, violation: 'TOO_SHORT' })
    expect(checkAddress('ke.go.healthy', ROOT)).toEqual({ valid: false, violation: 'NOT_ROOTED' })
    expect(checkAddress('ke.go.hospital.x', ROOT)).toEqual({ valid: false, violation: 'NOT_ROOTED' })
    expect(checkAddress('ke.go.health..emr', ROOT)).toEqual({ valid: false, violation: 'EMPTY_TOKEN' })
    expect(checkAddress('ke.go.health.emr.', ROOT)).toEqual({ valid: false, violation: 'EMPTY_TOKEN' })
    expect(checkAddress('ke.go.health.county-1', ROOT)).toEqual({ valid: false, violation: 'ILLEGAL_TOKEN' })
    expect(checkAddress('ke.go.health.county 1', ROOT)).toEqual({ valid: false, violation: 'ILLEGAL_TOKEN' })
  })

  it('validateAddress throws with the offending address and root', () => {
    expect(() => validateAddress('ke.go.health.emr', ROOT)).not.toThrow()
    try {
      validateAddress('ke.go.healthy', ROOT)
      throw new Error('expected InvalidAddressError')
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidAddressError)
      if (!(e instanceof InvalidAddressError)) return
      expect(e.address).toBe('ke.go.healthy')
      expect(e.rootAddress).toBe(ROOT)
      expect(e.reason.code).toBe('ADDRESS_NOT_ROOTED')
    }
  })

  it('root addresses must be made of well-formed tokens', () => {
    expect(violationOf(() => validateRootAddress('org.example'))).toBeUndefined()
    expect(violationOf(() => validateRootAddress(''))).toBe('EMPTY_TOKEN')
    expect(violationOf(() => validateRootAddress('ke..go'))).toBe('EMPTY_TOKEN')
    expect(violationOf(() => validateRootAddress('ke.go$'))).toBe('ILLEGAL_TOKEN')
  })
})

describe('address tree helpers', () => {
  it('tokenize keeps empty tokens', () => {
    expect(tokenize('a.b.c')).toEqual(['a', 'b', 'c'])
    expect(tokenize('a..b')).toEqual(['a', '', 'b'])
  })

  it('ancestry is token-aligned and strict', () => {
    expect(isAncestorOf('ke.go.health', 'ke.go.health.county1')).toBe(true)
    expect(isAncestorOf('ke.go.health', 'ke.go.health.county1.facility1')).toBe(true)
    expect(isAncestorOf('ke.go.health', 'ke.go.healthy')).toBe(false)
    expect(isAncestorOf('ke.go.health', 'ke.go.health')).toBe(false)
  })

  it('parentAddress drops the last token', () => {
    expect(parentAddress('ke.go.health.county1')).toBe('ke.go.health')
    expect(parentAddress('ke')).toBeUndefined()
  })
})

describe('channelName', () => {
  it('replaces every dot with an underscore', () => {
    expect(channelName('ke.go.health.county1')).toBe('ke_go_health_county1')
    expect(channelName('ke.go.health.cou_nty1')).toBe('ke_go_health_cou_nty1')
  })

  it('keeps the segment count for addresses without underscores', () => {
    const address = 'ke.go.health.county2.facility4.pis'
    const channel = channelName(address)
    expect(channel).not.toContain('.')
    expect(channel.split('_').length).toBe(tokenize(address).length)
  })
})
