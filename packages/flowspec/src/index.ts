export * from './types.js'
export * from './net/address.js'
export * from './ordering.js'
export * from './feasibility.js'
export * from './schema.js'
export * from './table.js'
