/**
 * WebVTT encoder
 */

import {
	formatTime,
	type SubtitleDocument,
	type Time,
	type WriteOptions,
	type WriteResult,
	type WriteWarning,
} from '@subforge/core'
import { escapeMarkup } from '../common/markup'
import { joinOutput, prepareEvents, renderMarkup, usedEmphasis, visibleText, type PreparedEvent } from '../common/render'
import { ConversionReport } from '../policy'

const VTT_TAGS = { bold: 'b', italic: 'i', underline: 'u' } as const

/**
 * Encode a document as WebVTT
 * Cues are written in start order; STYLE and REGION sections read from
 * WebVTT are written back before them.
 */
export function encodeVtt(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const report = new ConversionReport('vtt')
	const warnings: WriteWarning[] = []
	const applyStyles = options.applyStyles ?? true

	const events = prepareEvents(document, report, warnings, {
		timeFormat: 'vtt',
		handles: ['emphasis'],
		styleKeys: applyStyles ? ['bold', 'italic', 'underline'] : [],
		eventFields: ['name'],
	})
	// stable: equal starts keep document order
	const cues = [...events].sort((a, b) => a.event.start - b.event.start)

	const title = document.info.get('Title')
	let out = title ? `WEBVTT ${title}\n\n` : 'WEBVTT\n\n'

	for (const section of document.extraSections) {
		if (section.format !== 'vtt') continue
		out += `${section.name}\n${section.lines.join('\n')}\n\n`
	}

	for (const cue of cues) {
		const { start, end, name } = cue.event
		const voice = name ? `<v ${name}>` : ''

		out += `${formatVttTimestamp(start, options)} --> ${formatVttTimestamp(end, options)}\n`
		out += `${voice}${renderText(cue, applyStyles, report)}\n\n`
	}

	return report.result(joinOutput(out, options), warnings)
}

function renderText(cue: PreparedEvent, applyStyles: boolean, report: ConversionReport): string {
	const used = usedEmphasis(cue.fragments)
	if (used.has('strikeout') || (!applyStyles && used.size > 0)) {
		report.record('emphasis', { eventIndex: cue.index }, applyStyles ? 'Strikeout not written' : 'Emphasis not written (applyStyles off)')
	}

	const text = applyStyles ? renderMarkup(cue.fragments, VTT_TAGS, escapeMarkup) : escapeMarkup(visibleText(cue.fragments))
	// a blank line would end the cue
	return text.replace(/\n+/g, '\n').trim()
}

/**
 * Format VTT timestamp (HH:MM:SS.mmm, or MM:SS.mmm below one hour when short)
 */
export function formatVttTimestamp(time: Time, options: WriteOptions = {}): string {
	const timestamp = formatTime(time, 'vtt')
	return options.vttTimestamp === 'short' && time < 3600000 ? timestamp.slice(3) : timestamp
}
