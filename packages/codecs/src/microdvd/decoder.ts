/**
 * MicroDVD decoder
 */

import { SubtitleDocument, parseTime, type ReadOptions, type ReadResult } from '@subforge/core'
import { ParseContext, splitLines } from '../common/parse'

const LINE = /^\{(\d+)\}\{(\d+)\}(.*)$/
const FPS_DECLARATION = /^\d+(?:\.\d+)?$/
const CONTROL_CODE = /^\{([A-Za-z]):([^}]*)\}/

const EMPHASIS_TAGS: Record<string, string> = { b: '\\b1', i: '\\i1', u: '\\u1', s: '\\s1' }

/**
 * Check if text is MicroDVD
 */
export function isMicroDvd(text: string): boolean {
	return /^\s*\{\d+\}\{\d+\}/m.test(text)
}

/**
 * Decode MicroDVD text
 *
 * A leading "{1}{1}<fps>" line declares the frame rate; `options.fps`
 * takes precedence over it. Without either, frames cannot be converted
 * and reading fails with MissingFrameRateError.
 */
export function decodeMicroDvd(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'microdvd'

	let fps = options.fps
	let first = true

	for (const line of splitLines(text)) {
		const trimmed = line.text.trim()
		if (!trimmed) continue

		const match = trimmed.match(LINE)
		if (!match) {
			context.fail(line.number, 'Expected a {start}{end} subtitle line')
			continue
		}

		const start = match[1]!
		const end = match[2]!
		const body = match[3]!

		if (first && start === '1' && end === '1' && FPS_DECLARATION.test(body)) {
			first = false
			fps = options.fps ?? parseFloat(body)
			continue
		}
		first = false

		context.attempt(line.number, () =>
			document.addEvent(
				context.withLanguage({
					start: parseTime(start, 'microdvd', fps),
					end: parseTime(end, 'microdvd', fps),
					text: decodeControlCodes(body),
				})
			)
		)
	}

	document.fps = fps
	return { document, warnings: context.warnings }
}

/**
 * Turn "|" separated lines with control codes into event text
 *
 * Upper-case codes ({Y:i}, {C:$BBGGRR}) style the whole subtitle, lower-case
 * ones a single line. Font codes map to \fn and \fs; position and other
 * codes are dropped.
 */
export function decodeControlCodes(body: string): string {
	const lines = body.split('|').map(line => {
		let rest = line
		let global = ''
		let local = ''
		let code: RegExpMatchArray | null

		while ((code = rest.match(CONTROL_CODE))) {
			const tags = codeTags(code[1]!.toLowerCase(), code[2]!.trim())
			if (code[1] === code[1]!.toUpperCase()) global += tags
			else local += tags
			rest = rest.slice(code[0].length)
		}
		return { global, local, text: rest }
	})

	const global = lines.map(line => line.global).join('')
	const last = lines.length - 1

	const text = lines
		.map(({ local, text }, i) => {
			if (!local) return text
			// restore the subtitle-wide styling for the next line
			return i < last ? `{${local}}${text}{\\r${global}}` : `{${local}}${text}`
		})
		.join('\n')

	return global ? `{${global}}${text}` : text
}

function codeTags(code: string, value: string): string {
	switch (code) {
		case 'y':
			return value
				.split(',')
				.map(flag => EMPHASIS_TAGS[flag.trim().toLowerCase()] ?? '')
				.join('')
		case 'c': {
			const hex = value.match(/^\$?([0-9A-Fa-f]{6})$/)
			return hex ? `\\c&H${hex[1]!.toUpperCase()}&` : ''
		}
		case 'f':
			return value ? `\\fn${value}` : ''
		case 's':
			return /^\d+(?:\.\d+)?$/.test(value) ? `\\fs${value}` : ''
		default:
			return ''
	}
}
