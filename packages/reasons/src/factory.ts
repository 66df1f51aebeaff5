/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message` and add `context`.
 * Adding new codes: extend REASONS in the dto package. Keep codes stable once published; callers switch on them.
 */
import { ReasonDetail, ReasonCode } from '@addrnet/dto'
import { getReason } from './registry'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = getReason(code)
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    context: Object.keys(context).length ? context : undefined,
  }
}
