/**
 * SubRip decoder
 * Numbered blocks with HH:MM:SS,mmm --> HH:MM:SS,mmm timing lines
 */

import { SubtitleDocument, parseTime, type ReadOptions, type ReadResult, type Time } from '@subforge/core'
import { markupToTags } from '../common/markup'
import { ParseContext, splitLines } from '../common/parse'

const TIMING_LINE = /^\s*\d{1,2}:\d{1,2}:\d{1,2}[,.]\d{1,3}\s*-->\s*\d{1,2}:\d{1,2}:\d{1,2}[,.]\d{1,3}/m
const TIMING = /^\s*(\S+)\s*-->\s*(\S+)/
const INDEX = /^\s*\d+\s*$/

/**
 * Check if text is SubRip
 */
export function isSrt(text: string): boolean {
	// disambiguation vs. SubStation and WebVTT
	if (text.includes('[Script Info]') || text.includes('[V4+ Styles]')) return false
	if (text.trimStart().startsWith('WEBVTT')) return false

	return TIMING_LINE.test(text)
}

interface PendingCue {
	line: number
	start: Time
	end: Time
	text: string[]
}

/**
 * Decode SubRip text
 *
 * A cue runs from its timing line to the next timing line (or the number
 * line right before it), so blank lines inside cue text are tolerated.
 */
export function decodeSrt(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'srt'

	const lines = splitLines(text)
	let current: PendingCue | null = null
	let skipping = false

	const flush = () => {
		if (!current) return
		const cue = current
		current = null
		context.attempt(cue.line, () =>
			document.addEvent(
				context.withLanguage({
					start: cue.start,
					end: cue.end,
					text: markupToTags(cue.text.join('\n'), options).trim(),
				})
			)
		)
	}

	for (let i = 0; i < lines.length; i++) {
		const { text: line, number } = lines[i]!

		if (line.trim() === '') {
			skipping = false
			continue
		}
		if (skipping) continue

		if (line.includes('-->')) {
			flush()
			const match = line.match(TIMING)
			let times: readonly [Time, Time] | undefined
			if (match) {
				times = context.attempt(number, () => [parseTime(match[1]!, 'srt'), parseTime(match[2]!, 'srt')] as const)
			} else {
				context.fail(number, 'Malformed timing line')
			}
			if (times) {
				current = { line: number, start: times[0], end: times[1], text: [] }
			} else {
				skipping = true
			}
			continue
		}

		// number of the next cue
		if (INDEX.test(line) && lines[i + 1]?.text.includes('-->')) {
			flush()
			continue
		}

		if (current) {
			current.text.push(line)
			continue
		}

		context.fail(number, 'Expected a subtitle number or timing line')
		skipping = true
	}
	flush()

	return { document, warnings: context.warnings }
}
