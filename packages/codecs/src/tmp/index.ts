/**
 * TMP codec
 */

export * from './decoder'
export * from './encoder'
export * from './codec'
