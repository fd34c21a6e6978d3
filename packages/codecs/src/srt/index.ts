/**
 * SubRip (SRT) codec
 *
 * Features:
 * - Numbered cue blocks, "," or "." millisecond separator
 * - <b>, <i>, <u>, <s> converted to and from override tags
 * - Unknown markup kept or stripped
 * - Lenient reading of damaged files
 */

export * from './decoder'
export * from './encoder'
export * from './codec'
