import type { FeasibilityOptions } from '@flowgate/config'
import type { IPAddress, IPPrefix } from './net/address.js'

/**
 * FlowSpec component type octets (RFC8955 §4.2.2).
 */
export const ComponentType = {
  DestinationPrefix: 1,
  SourcePrefix: 2,
  IpProtocol: 3,
  Port: 4,
  // TODO: types 5-12 (destination port through flow label)
} as const

export type ComponentType = (typeof ComponentType)[keyof typeof ComponentType]

export type PrefixComponentType =
  | typeof ComponentType.DestinationPrefix
  | typeof ComponentType.SourcePrefix

export type RawComponentType = Exclude<ComponentType, PrefixComponentType>

export interface PrefixComponent {
  readonly type: PrefixComponentType
  readonly prefix: IPPrefix
}

/**
 * Any non-prefix component. `raw` carries the NLRI-encoded operator/value
 * bytes, compared as-is for ordering (RFC8955 §5.1).
 */
export interface RawComponent {
  readonly type: RawComponentType
  readonly raw: Uint8Array
}

export type Component = PrefixComponent | RawComponent

/**
 * Ordered components of one FlowSpec rule. Expected ascending by type with
 * at most one entry per type.
 */
export type ComponentList = readonly Component[]

export function isPrefixComponent(component: Component): component is PrefixComponent {
  return (
    component.type === ComponentType.DestinationPrefix ||
    component.type === ComponentType.SourcePrefix
  )
}

/**
 * The parts of a FlowSpec route needed for RFC8955/RFC9117 feasibility.
 */
export interface FlowSpecRoute {
  readonly destPrefix?: IPPrefix
  readonly fromEbgp: boolean
  readonly neighborAs: number
  readonly asPath: readonly number[]
  readonly originatorId?: IPAddress
}

/**
 * A FlowSpec rule as held by a host: identity, ranking key and route.
 */
export interface FlowSpecEntry {
  readonly id: string
  readonly key: ComponentList
  readonly route: FlowSpecRoute
}

/**
 * Minimal projection of a unicast RIB entry.
 */
export interface UnicastRoute {
  readonly prefix: IPPrefix
  readonly neighborAs: number
  readonly asPath: readonly number[]
  readonly originatorId?: IPAddress
}

/**
 * Read-only view of the unicast RIB. Best-path selection and storage belong
 * to the implementation.
 */
export interface UnicastRib {
  /** The route used to forward traffic towards `prefix`, if any. */
  bestPath(prefix: IPPrefix): UnicastRoute | undefined
  /** Routes strictly more specific than `prefix`, in no particular order. */
  moreSpecifics(prefix: IPPrefix): readonly UnicastRoute[]
}

/**
 * AS_PATH admission policy (RFC9117 §4.1 b.2.3). Carried in the config but
 * not consulted by the feasibility chain yet.
 */
export interface AsPathPolicy {
  allows(asPath: readonly number[]): boolean
}

export const allowAllAsPaths: AsPathPolicy = {
  allows: () => true,
}

export type FeasibilityConfig = FeasibilityOptions & {
  asPathPolicy?: AsPathPolicy
}

export const DEFAULT_FEASIBILITY_CONFIG: FeasibilityConfig = {
  allowNoDestPrefix: false,
  emptyAsPathRelaxation: true,
  asPathPolicy: allowAllAsPaths,
}
