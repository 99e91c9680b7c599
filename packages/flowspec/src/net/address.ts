import { isIPv4, isIPv6 } from 'node:net'

export type AddressFamily = 4 | 6

/**
 * An IPv4 or IPv6 address held as an unsigned integer.
 */
export interface IPAddress {
  readonly family: AddressFamily
  readonly value: bigint
}

/**
 * A network prefix. The address is kept exactly as written: host bits are
 * not masked off, so `192.0.2.0/16` keeps `192.0.2.0`.
 */
export interface IPPrefix {
  readonly address: IPAddress
  readonly bits: number
}

export class InvalidAddressError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidAddressError'
  }
}

const V4_MAPPED_TAG = 0xffffn

export function addressWidth(family: AddressFamily): number {
  return family === 4 ? 32 : 128
}

function parseIPv4(text: string): bigint {
  return text.split('.').reduce((acc, octet) => (acc << 8n) | BigInt(Number(octet)), 0n)
}

function parseIPv6Groups(text: string): number[] {
  if (text === '') return []
  const parts = text.split(':')
  const groups: number[] = []
  for (const part of parts) {
    if (part.includes('.')) {
      const v4 = parseIPv4(part)
      groups.push(Number(v4 >> 16n), Number(v4 & 0xffffn))
    } else {
      groups.push(parseInt(part, 16))
    }
  }
  return groups
}

function parseIPv6(text: string): bigint {
  const gap = text.indexOf('::')
  const head = parseIPv6Groups(gap === -1 ? text : text.slice(0, gap))
  const tail = gap === -1 ? [] : parseIPv6Groups(text.slice(gap + 2))
  const fill = new Array<number>(8 - head.length - tail.length).fill(0)
  return [...head, ...fill, ...tail].reduce((acc, group) => (acc << 16n) | BigInt(group), 0n)
}

export function parseAddress(text: string): IPAddress {
  if (isIPv4(text)) {
    return { family: 4, value: parseIPv4(text) }
  }
  if (isIPv6(text) && !text.includes('%')) {
    return { family: 6, value: parseIPv6(text) }
  }
  throw new InvalidAddressError(`invalid IP address: "${text}"`)
}

export function parsePrefix(text: string): IPPrefix {
  const slash = text.indexOf('/')
  if (slash === -1) {
    throw new InvalidAddressError(`invalid prefix: "${text}" has no length`)
  }
  const address = parseAddress(text.slice(0, slash))
  const lengthText = text.slice(slash + 1)
  const bits = Number(lengthText)
  if (!/^\d{1,3}$/.test(lengthText) || bits > addressWidth(address.family)) {
    throw new InvalidAddressError(`invalid prefix: "${text}" has a bad length`)
  }
  return { address, bits }
}

export function formatAddress(address: IPAddress): string {
  if (address.family === 4) {
    return [24n, 16n, 8n, 0n].map((shift) => String((address.value >> shift) & 0xffn)).join('.')
  }

  const groups: number[] = []
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    groups.push(Number((address.value >> shift) & 0xffffn))
  }

  // RFC5952: collapse the longest run (2+) of zero groups, leftmost on ties
  let bestStart = -1
  let bestLength = 1
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++
      continue
    }
    let j = i
    while (j < groups.length && groups[j] === 0) j++
    if (j - i > bestLength) {
      bestStart = i
      bestLength = j - i
    }
    i = j
  }

  const hex = groups.map((group) => group.toString(16))
  if (bestStart === -1) return hex.join(':')
  const head = hex.slice(0, bestStart).join(':')
  const tail = hex.slice(bestStart + bestLength).join(':')
  return `${head}::${tail}`
}

export function formatPrefix(prefix: IPPrefix): string {
  return `${formatAddress(prefix.address)}/${prefix.bits}`
}

/**
 * Whether `address` falls inside `prefix`. Addresses of the other family are
 * never contained.
 */
export function prefixContains(prefix: IPPrefix, address: IPAddress): boolean {
  if (prefix.address.family !== address.family) return false
  const width = BigInt(addressWidth(address.family))
  const hostBits = width - BigInt(prefix.bits)
  return prefix.address.value >> hostBits === address.value >> hostBits
}

/**
 * Orders IPv4 before IPv6, then by numeric value.
 */
export function compareAddresses(a: IPAddress, b: IPAddress): -1 | 0 | 1 {
  if (a.family !== b.family) return a.family < b.family ? -1 : 1
  if (a.value === b.value) return 0
  return a.value < b.value ? -1 : 1
}

function unmap(address: IPAddress): IPAddress {
  if (address.family === 6 && address.value >> 32n === V4_MAPPED_TAG) {
    return { family: 4, value: address.value & 0xffffffffn }
  }
  return address
}

/**
 * Identity comparison for router identifiers: an IPv4-mapped IPv6 address
 * equals its IPv4 form.
 */
export function addressesEqual(a: IPAddress, b: IPAddress): boolean {
  const left = unmap(a)
  const right = unmap(b)
  return left.family === right.family && left.value === right.value
}
