/**
 * @subforge/codecs - subtitle format readers and writers
 *
 * Formats:
 * - ASS/SSA (Advanced SubStation Alpha / SubStation Alpha v4)
 * - SRT (SubRip)
 * - WebVTT
 * - MicroDVD (frame-based)
 * - MPL2
 * - TMP
 * - JSON (lossless interchange)
 */

export * from './ass'
export * from './json'
export * from './microdvd'
export * from './mpl2'
export * from './srt'
export * from './tmp'
export * from './vtt'

export * from './policy'
export * from './registry'
