/**
 * MPL2 decoder
 */

import { SubtitleDocument, parseTime, type ReadOptions, type ReadResult } from '@subforge/core'
import { ParseContext, splitLines } from '../common/parse'

const LINE = /^\[(\d+)\]\[(\d+)\](.*)$/

/**
 * Check if text is MPL2
 */
export function isMpl2(text: string): boolean {
	return /^\s*\[\d+\]\[\d+\]/m.test(text)
}

/**
 * Decode MPL2 text ([start][end] in deciseconds, "/" marks an italic line)
 */
export function decodeMpl2(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'mpl2'

	for (const line of splitLines(text)) {
		const trimmed = line.text.trim()
		if (!trimmed) continue

		const match = trimmed.match(LINE)
		if (!match) {
			context.fail(line.number, 'Expected a [start][end] subtitle line')
			continue
		}

		const start = match[1]!
		const end = match[2]!
		const body = match[3]!

		context.attempt(line.number, () =>
			document.addEvent(
				context.withLanguage({
					start: parseTime(start, 'mpl2'),
					end: parseTime(end, 'mpl2'),
					text: body
						.split('|')
						.map(part => (part.startsWith('/') ? `{\\i1}${part.slice(1)}{\\i0}` : part))
						.join('\n'),
				})
			)
		)
	}

	return { document, warnings: context.warnings }
}
