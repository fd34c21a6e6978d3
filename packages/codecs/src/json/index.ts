/**
 * JSON codec
 * Lossless interchange of info, styles, events and kept sections
 */

export * from './types'
export * from './decoder'
export * from './encoder'
export * from './codec'
