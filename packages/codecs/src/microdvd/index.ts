/**
 * MicroDVD codec
 *
 * Features:
 * - Frame-based {start}{end} lines, "|" line breaks
 * - {1}{1}fps declaration
 * - {y:}/{Y:} emphasis, {c:}/{C:} color, {f:} and {s:} font codes
 */

export * from './decoder'
export * from './encoder'
export * from './codec'
