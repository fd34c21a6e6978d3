/**
 * SubRip encoder
 */

import {
	formatTime,
	unescapeText,
	type SubtitleDocument,
	type Time,
	type WriteOptions,
	type WriteResult,
	type WriteWarning,
} from '@subforge/core'
import {
	EMPHASIS,
	joinOutput,
	prepareEvents,
	renderMarkup,
	usedEmphasis,
	visibleText,
	type PreparedEvent,
} from '../common/render'
import { ConversionReport } from '../policy'

const SRT_TAGS = { bold: 'b', italic: 'i', underline: 'u', strikeout: 's' } as const

/**
 * Encode a document as SubRip
 *
 * Options:
 * - applyStyles: write <b>/<i>/<u>/<s> from styles and override tags (default true)
 * - keepSsaTags: pass override tags through verbatim instead
 * - msSeparator: "," (standard) or "." (some players)
 */
export function encodeSrt(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const report = new ConversionReport('srt')
	const warnings: WriteWarning[] = []
	const applyStyles = options.applyStyles ?? true
	const keepTags = options.keepSsaTags ?? false

	const events = prepareEvents(document, report, warnings, {
		timeFormat: 'srt',
		handles: ['emphasis'],
		styleKeys: applyStyles && !keepTags ? EMPHASIS : [],
		keepTags,
	})

	let out = ''
	events.forEach((prepared, i) => {
		const { start, end } = prepared.event
		const text = keepTags ? unescapeText(prepared.event.text) : renderText(prepared, applyStyles, report)

		out += `${i + 1}\n`
		out += `${formatSrtTimestamp(start, options)} --> ${formatSrtTimestamp(end, options)}\n`
		out += `${tidy(text)}\n\n`
	})

	return report.result(joinOutput(out, options), warnings)
}

function renderText(prepared: PreparedEvent, applyStyles: boolean, report: ConversionReport): string {
	if (applyStyles) return renderMarkup(prepared.fragments, SRT_TAGS)

	if (usedEmphasis(prepared.fragments).size > 0) {
		report.record('emphasis', { eventIndex: prepared.index }, 'Emphasis not written (applyStyles off)')
	}
	return visibleText(prepared.fragments)
}

// a blank line would end the cue
function tidy(text: string): string {
	return text.replace(/\n+/g, '\n').trim()
}

/**
 * Format SRT timestamp (HH:MM:SS,mmm)
 */
export function formatSrtTimestamp(time: Time, options: WriteOptions = {}): string {
	const timestamp = formatTime(time, 'srt')
	return options.msSeparator === '.' ? timestamp.replace(',', '.') : timestamp
}
