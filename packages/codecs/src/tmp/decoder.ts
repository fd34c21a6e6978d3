/**
 * TMP decoder
 */

import {
	SubtitleDocument,
	normalizeLineBreaks,
	parseTime,
	type ReadOptions,
	type ReadResult,
	type Time,
} from '@subforge/core'
import { ParseContext, splitLines } from '../common/parse'

const LINE = /^(\d+:\d{2}:\d{2}):(.*)$/

/** How long a subtitle stays up when the next one does not cut it short */
export const TMP_DURATION: Time = 5000

/**
 * Check if text is TMP
 */
export function isTmp(text: string): boolean {
	if (text.includes('-->') || /^\s*\[Script Info\]/im.test(text)) return false
	return /^\s*\d{1,2}:\d{2}:\d{2}:/m.test(text)
}

/**
 * End of a subtitle starting at `start`: the next start, or TMP_DURATION later,
 * whichever comes first
 */
export function tmpEnd(start: Time, next: Time | undefined): Time {
	return next !== undefined && next >= start ? Math.min(next, start + TMP_DURATION) : start + TMP_DURATION
}

/**
 * Decode TMP text (HH:MM:SS:text lines, "|" line breaks)
 */
export function decodeTmp(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'tmp'

	const entries: { line: number; start: Time; text: string }[] = []

	for (const line of splitLines(text)) {
		const trimmed = line.text.trim()
		if (!trimmed) continue

		const match = trimmed.match(LINE)
		if (!match) {
			context.fail(line.number, 'Expected a HH:MM:SS:text line')
			continue
		}

		const body = match[2]!
		const start = context.attempt(line.number, () => parseTime(match[1]!, 'tmp'))
		if (start !== undefined) entries.push({ line: line.number, start, text: normalizeLineBreaks(body, 'pipe') })
	}

	entries.forEach((entry, i) => {
		context.attempt(entry.line, () =>
			document.addEvent(
				context.withLanguage({
					start: entry.start,
					end: tmpEnd(entry.start, entries[i + 1]?.start),
					text: entry.text,
				})
			)
		)
	})

	return { document, warnings: context.warnings }
}
