/**
 * MPL2 encoder
 */

import { formatTime, type SubtitleDocument, type WriteOptions, type WriteResult, type WriteWarning } from '@subforge/core'
import { commonEmphasis, joinOutput, prepareEvents, splitFragmentLines, usedEmphasis, type PreparedEvent } from '../common/render'
import { ConversionReport } from '../policy'

/**
 * Encode a document as MPL2
 * Only whole-line italics survive; other emphasis is approximated away.
 */
export function encodeMpl2(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const report = new ConversionReport('mpl2')
	const warnings: WriteWarning[] = []
	const events = prepareEvents(document, report, warnings, {
		timeFormat: 'mpl2',
		handles: ['emphasis'],
		styleKeys: ['italic'],
	})

	let out = ''
	for (const prepared of events) {
		const { start, end } = prepared.event
		out += `[${formatTime(start, 'mpl2')}][${formatTime(end, 'mpl2')}]${renderBody(prepared, report)}\n`
	}

	return report.result(joinOutput(out, options), warnings)
}

function renderBody(prepared: PreparedEvent, report: ConversionReport): string {
	return splitFragmentLines(prepared.fragments)
		.map(line => {
			const italic = commonEmphasis(line).has('italic')
			const lost = [...usedEmphasis(line)].some(key => key !== 'italic' || !italic)
			if (lost) report.record('emphasis', { eventIndex: prepared.index }, 'Only whole-line italics written')

			const text = line.map(fragment => fragment.text).join('')
			return italic ? `/${text}` : text
		})
		.join('|')
}
