import { z } from 'zod'
import { parseAddress, parsePrefix } from './net/address.js'
import { ComponentType } from './types.js'

export const IPAddressSchema = z.union([z.ipv4(), z.ipv6()]).transform(parseAddress)

export const IPPrefixSchema = z.union([z.cidrv4(), z.cidrv6()]).transform(parsePrefix)

export const AsNumberSchema = z.number().int().min(0).max(0xffffffff)

export const AsPathSchema = z.array(AsNumberSchema)

const HexBytesSchema = z
  .string()
  .regex(/^(?:[0-9a-f]{2})+$/i, 'Expected a non-empty, even-length hex string')
  .transform((hex) => Uint8Array.from(Buffer.from(hex, 'hex')))

export const PrefixComponentSchema = z.object({
  type: z.union([
    z.literal(ComponentType.DestinationPrefix),
    z.literal(ComponentType.SourcePrefix),
  ]),
  prefix: IPPrefixSchema,
})

export const RawComponentSchema = z.object({
  type: z.union([z.literal(ComponentType.IpProtocol), z.literal(ComponentType.Port)]),
  raw: HexBytesSchema,
})

export const ComponentSchema = z.union([PrefixComponentSchema, RawComponentSchema])

/**
 * Component list in NLRI order: strictly ascending by type.
 */
export const ComponentListSchema = z
  .array(ComponentSchema)
  .refine(
    (components) => components.every((c, i) => i === 0 || components[i - 1].type < c.type),
    'Components must be strictly ascending by type'
  )

export const FlowSpecRouteSchema = z.object({
  destPrefix: IPPrefixSchema.optional(),
  fromEbgp: z.boolean().default(false),
  neighborAs: AsNumberSchema,
  asPath: AsPathSchema.default([]),
  originatorId: IPAddressSchema.optional(),
})

export const UnicastRouteSchema = z.object({
  prefix: IPPrefixSchema,
  neighborAs: AsNumberSchema,
  asPath: AsPathSchema.default([]),
  originatorId: IPAddressSchema.optional(),
})

/**
 * A FlowSpec rule as held by a host: identity, ranking key and route.
 */
export const FlowSpecEntrySchema = z.object({
  id: z.string().min(1),
  key: ComponentListSchema,
  route: FlowSpecRouteSchema,
})

export type FlowSpecEntryInput = z.input<typeof FlowSpecEntrySchema>
