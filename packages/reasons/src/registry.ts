/**
 * Reasons Registry
 * Machine-parsable rejection codes for the router, keyed by code and by address violation.
 */
import { AddressViolation, ReasonCode, ReasonDetail, REASONS as DTO_REASONS, VIOLATION_CODES } from '@addrnet/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export function getReason(code: ReasonCode): ReasonDetail { return REASONS[code] }

export function codeForViolation(violation: AddressViolation): ReasonCode { return VIOLATION_CODES[violation] }

export type { ReasonDetail }
