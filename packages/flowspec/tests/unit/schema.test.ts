import { describe, it, expect } from 'vitest'
import {
  ComponentListSchema,
  ComponentType,
  FlowSpecEntrySchema,
  FlowSpecRouteSchema,
  IPAddressSchema,
  IPPrefixSchema,
  UnicastRouteSchema,
  formatPrefix,
} from '../../src/index.js'

describe('IPPrefixSchema', () => {
  it('parses IPv4 and IPv6 CIDR strings', () => {
    const v4 = IPPrefixSchema.parse('192.0.2.0/24')
    expect(v4).toEqual({ address: { family: 4, value: 0xc0000200n }, bits: 24 })
    expect(formatPrefix(IPPrefixSchema.parse('2001:db8::/32'))).toBe('2001:db8::/32')
  })

  it('rejects strings without a length', () => {
    expect(IPPrefixSchema.safeParse('192.0.2.0').success).toBe(false)
  })
})

describe('IPAddressSchema', () => {
  it('parses a router id', () => {
    expect(IPAddressSchema.parse('192.0.2.1')).toEqual({ family: 4, value: 0xc0000201n })
  })

  it('rejects a hostname', () => {
    expect(IPAddressSchema.safeParse('router-1.example').success).toBe(false)
  })
})

describe('ComponentListSchema', () => {
  it('builds prefix and raw components', () => {
    const result = ComponentListSchema.safeParse([
      { type: ComponentType.DestinationPrefix, prefix: '192.0.2.0/24' },
      { type: ComponentType.IpProtocol, raw: '8106' },
    ])
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data[0]).toEqual({
        type: 1,
        prefix: { address: { family: 4, value: 0xc0000200n }, bits: 24 },
      })
      expect(result.data[1]).toEqual({ type: 3, raw: Uint8Array.from([0x81, 0x06]) })
    }
  })

  it('rejects components out of type order', () => {
    const result = ComponentListSchema.safeParse([
      { type: ComponentType.IpProtocol, raw: '8106' },
      { type: ComponentType.DestinationPrefix, prefix: '192.0.2.0/24' },
    ])
    expect(result.success).toBe(false)
  })

  it('rejects duplicate types', () => {
    const result = ComponentListSchema.safeParse([
      { type: ComponentType.Port, raw: '9150' },
      { type: ComponentType.Port, raw: '9116' },
    ])
    expect(result.success).toBe(false)
  })

  it('rejects a prefix payload on a raw type', () => {
    const result = ComponentListSchema.safeParse([
      { type: ComponentType.Port, prefix: '192.0.2.0/24' },
    ])
    expect(result.success).toBe(false)
  })

  it('rejects odd-length or non-hex raw values', () => {
    expect(ComponentListSchema.safeParse([{ type: 3, raw: '810' }]).success).toBe(false)
    expect(ComponentListSchema.safeParse([{ type: 3, raw: 'zz' }]).success).toBe(false)
    expect(ComponentListSchema.safeParse([{ type: 3, raw: '' }]).success).toBe(false)
  })

  it('rejects unimplemented component types', () => {
    expect(ComponentListSchema.safeParse([{ type: 5, raw: '8116' }]).success).toBe(false)
  })
})

describe('FlowSpecRouteSchema', () => {
  it('fills defaults', () => {
    const result = FlowSpecRouteSchema.parse({ neighborAs: 65001 })
    expect(result.fromEbgp).toBe(false)
    expect(result.asPath).toEqual([])
    expect(result.destPrefix).toBeUndefined()
    expect(result.originatorId).toBeUndefined()
  })

  it('rejects AS numbers outside 32 bits', () => {
    expect(FlowSpecRouteSchema.safeParse({ neighborAs: 4294967296 }).success).toBe(false)
    expect(FlowSpecRouteSchema.safeParse({ neighborAs: 65001, asPath: [-1] }).success).toBe(false)
  })
})

describe('UnicastRouteSchema', () => {
  it('requires a prefix', () => {
    expect(UnicastRouteSchema.safeParse({ neighborAs: 65001 }).success).toBe(false)
  })

  it('parses a full route', () => {
    const result = UnicastRouteSchema.parse({
      prefix: '192.88.99.0/24',
      neighborAs: 65001,
      asPath: [65001, 64512],
      originatorId: '192.0.2.1',
    })
    expect(result.asPath).toEqual([65001, 64512])
    expect(result.originatorId).toEqual({ family: 4, value: 0xc0000201n })
  })
})

describe('FlowSpecEntrySchema', () => {
  it('requires a non-empty id', () => {
    const result = FlowSpecEntrySchema.safeParse({
      id: '',
      key: [],
      route: { neighborAs: 65001 },
    })
    expect(result.success).toBe(false)
  })
})
