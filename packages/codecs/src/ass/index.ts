/**
 * ASS/SSA codec
 *
 * Features:
 * - [Script Info], [V4+ Styles] / [V4 Styles] and [Events] with Format-driven fields
 * - Dialogue and Comment events, \N line breaks
 * - SSA decimal colors and legacy alignment
 * - [Fonts], [Graphics] and other sections kept for write-back
 */

export * from './types'
export * from './decoder'
export * from './encoder'
export * from './codec'
