import { compareAddresses, prefixContains, type IPPrefix } from './net/address.js'
import {
  ComponentType,
  isPrefixComponent,
  type Component,
  type ComponentList,
  type FlowSpecRoute,
} from './types.js'

/**
 * Outcome of comparing two component lists. The numeric values make
 * `compareFlowSpecKeys` usable directly as an `Array.prototype.sort`
 * comparator, highest precedence first.
 */
export const Precedence = {
  APrecedes: -1,
  Equal: 0,
  BPrecedes: 1,
} as const

export type Precedence = (typeof Precedence)[keyof typeof Precedence]

/**
 * More specific wins. A disjoint pair of prefixes yields `Equal` here, which
 * lets the caller move on to the next position.
 */
function comparePrefixes(a: IPPrefix, b: IPPrefix): Precedence {
  if (a.bits > b.bits && prefixContains(b, a.address)) return Precedence.APrecedes
  if (b.bits > a.bits && prefixContains(a, b.address)) return Precedence.BPrecedes
  if (a.bits === b.bits) return compareAddresses(a.address, b.address)
  return Precedence.Equal
}

/**
 * Unsigned memcmp over the common length; on a tie the longer value wins.
 */
function compareRaw(a: Uint8Array, b: Uint8Array): Precedence {
  const common = Math.min(a.length, b.length)
  for (let i = 0; i < common; i++) {
    if (a[i] < b[i]) return Precedence.APrecedes
    if (b[i] < a[i]) return Precedence.BPrecedes
  }
  if (a.length > b.length) return Precedence.APrecedes
  if (b.length > a.length) return Precedence.BPrecedes
  return Precedence.Equal
}

function compareComponents(a: Component, b: Component): Precedence {
  if (a.type < b.type) return Precedence.APrecedes
  if (b.type < a.type) return Precedence.BPrecedes
  if (isPrefixComponent(a) && isPrefixComponent(b)) return comparePrefixes(a.prefix, b.prefix)
  if (!isPrefixComponent(a) && !isPrefixComponent(b)) return compareRaw(a.raw, b.raw)
  // Same type tag with different payload kinds cannot be built through the types
  return Precedence.Equal
}

/**
 * Compares two FlowSpec keys according to RFC8955 §5.1.
 *
 * A list with more components wins outright. Otherwise components are walked
 * pairwise and the first position that decides, decides the whole comparison.
 * Lists are compared by count rather than by the union of their types, so the
 * result is only meaningful for lists built in ascending type order.
 */
export function compareFlowSpecKeys(a: ComponentList, b: ComponentList): Precedence {
  if (a.length > b.length) return Precedence.APrecedes
  if (b.length > a.length) return Precedence.BPrecedes

  for (let i = 0; i < a.length; i++) {
    const result = compareComponents(a[i], b[i])
    if (result !== Precedence.Equal) return result
  }
  return Precedence.Equal
}

/**
 * Returns a copy of `keys` ordered from highest to lowest precedence.
 */
export function sortFlowSpecKeys<T extends ComponentList>(keys: readonly T[]): T[] {
  return [...keys].sort(compareFlowSpecKeys)
}

/**
 * The component list implied by a FlowSpec route: its destination prefix, if
 * it has one.
 */
export function keyFromFlowSpecRoute(route: FlowSpecRoute): ComponentList {
  if (!route.destPrefix) return []
  return [{ type: ComponentType.DestinationPrefix, prefix: route.destPrefix }]
}
