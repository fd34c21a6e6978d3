/**
 * HTML-like cue markup used by SubRip and WebVTT
 */

import type { ReadOptions } from '@subforge/core'

const EMPHASIS_TAG = /<\s*(\/?)\s*([bius])\s*>/gi
const ANY_TAG = /<\/?(?:[A-Za-z][^<>]*|\d[\d:.]*)>/g

const ENTITIES: Record<string, string> = {
	amp: '&',
	lt: '<',
	gt: '>',
	quot: '"',
	apos: "'",
	nbsp: '\u00a0',
	lrm: '\u200e',
	rlm: '\u200f',
}

/**
 * Convert <b>, <i>, <u>, <s> to override tags and strip (or keep) other markup
 */
export function markupToTags(text: string, options: ReadOptions): string {
	if (options.keepHtmlTags) return text

	const converted = text.replace(
		EMPHASIS_TAG,
		(_match: string, close: string, tag: string) => `{\\${tag.toLowerCase()}${close ? 0 : 1}}`
	)
	if (options.keepUnknownHtml) return converted

	const stripped = options.stripHtml ? options.stripHtml(converted) : converted.replace(ANY_TAG, '')
	return decodeEntities(stripped)
}

export function decodeEntities(text: string): string {
	return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (entity: string, body: string) => {
		if (body.startsWith('#')) {
			const code = body.startsWith('#x') ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10)
			return code <= 0x10ffff ? String.fromCodePoint(code) : entity
		}
		return ENTITIES[body] ?? entity
	})
}

export function escapeMarkup(text: string): string {
	return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}
