import { addressesEqual, type IPAddress } from './net/address.js'
import {
  DEFAULT_FEASIBILITY_CONFIG,
  type FeasibilityConfig,
  type FlowSpecRoute,
  type UnicastRib,
} from './types.js'

/**
 * Reasons a FlowSpec route is rejected, in the order the checks run.
 */
export const RejectionReason = {
  NoDestinationPrefix: 'no-destination-prefix',
  NoBestUnicast: 'no-best-unicast',
  OriginatorValidationFailed: 'originator-validation-failed',
  MoreSpecificFromOtherNeighbor: 'more-specific-from-other-neighbor',
  LeftMostASMismatch: 'left-most-as-mismatch',
} as const

export type RejectionReason = (typeof RejectionReason)[keyof typeof RejectionReason]

export const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  [RejectionReason.NoDestinationPrefix]:
    'destination prefix component not present and not allowed by configuration (RFC8955 §6 a)',
  [RejectionReason.NoBestUnicast]:
    'no unicast best path covers the destination prefix (RFC8955 §6 b)',
  [RejectionReason.OriginatorValidationFailed]:
    'originator does not match the unicast best path originator (RFC8955 §6 b, RFC9117 §4.1)',
  [RejectionReason.MoreSpecificFromOtherNeighbor]:
    'a more-specific unicast route is learned from a different neighbor AS (RFC8955 §6 c)',
  [RejectionReason.LeftMostASMismatch]:
    'left-most AS of the AS_PATH differs from the unicast best path (RFC9117 §4.2)',
}

/**
 * Feasibility verdict, discriminated on `valid`.
 */
export type FeasibilityResult =
  | { valid: true }
  | { valid: false; reason: RejectionReason; error: string }

function reject(reason: RejectionReason): FeasibilityResult {
  return { valid: false, reason, error: REJECTION_MESSAGES[reason] }
}

function sameOriginator(a: IPAddress | undefined, b: IPAddress | undefined): boolean {
  if (a === undefined || b === undefined) return a === b
  return addressesEqual(a, b)
}

/**
 * Applies the RFC8955 §6 and RFC9117 §4 feasibility rules to a FlowSpec
 * route. The first failing rule determines the result.
 *
 * Makes at most one `bestPath` and one `moreSpecifics` query against `rib`.
 */
export function validateFeasibility(
  route: FlowSpecRoute,
  rib: UnicastRib,
  config: FeasibilityConfig = DEFAULT_FEASIBILITY_CONFIG
): FeasibilityResult {
  // Rule a): rules b) and c) have nothing to correlate against without a destination
  const dest = route.destPrefix
  if (!dest) {
    return config.allowNoDestPrefix ? { valid: true } : reject(RejectionReason.NoDestinationPrefix)
  }

  // Rule b)
  const best = rib.bestPath(dest)
  if (!best) {
    return reject(RejectionReason.NoBestUnicast)
  }
  const trustedEmptyPath =
    config.emptyAsPathRelaxation && !route.fromEbgp && route.asPath.length === 0
  if (!trustedEmptyPath && !sameOriginator(route.originatorId, best.originatorId)) {
    return reject(RejectionReason.OriginatorValidationFailed)
  }

  // Rule c)
  const conflicting = rib.moreSpecifics(dest).some((r) => r.neighborAs !== best.neighborAs)
  if (conflicting) {
    return reject(RejectionReason.MoreSpecificFromOtherNeighbor)
  }

  // RFC9117 §4.2: an empty best-path AS_PATH means a locally originated
  // prefix, which no eBGP FlowSpec route may control
  if (route.fromEbgp) {
    if (best.asPath.length === 0 || route.asPath.length === 0) {
      return reject(RejectionReason.LeftMostASMismatch)
    }
    if (route.asPath[0] !== best.asPath[0]) {
      return reject(RejectionReason.LeftMostASMismatch)
    }
  }

  return { valid: true }
}
