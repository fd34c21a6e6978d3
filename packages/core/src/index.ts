/**
 * @subforge/core - subtitle document model
 */

export * from './color'
export * from './document'
export * from './errors'
export * from './event'
export * from './format'
export * from './style'
export * from './tags'
export * from './time'
export * from './types'
