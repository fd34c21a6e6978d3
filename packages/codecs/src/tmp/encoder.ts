/**
 * TMP encoder
 */

import {
	encodeLineBreaks,
	formatTime,
	quantizeTime,
	type SubtitleDocument,
	type WriteOptions,
	type WriteResult,
	type WriteWarning,
} from '@subforge/core'
import { joinOutput, prepareEvents, visibleText } from '../common/render'
import { ConversionReport } from '../policy'
import { tmpEnd } from './decoder'

/**
 * Encode a document as TMP
 * End times are implied by the next start, so an end a reader would not
 * reconstruct is noted as lost precision.
 */
export function encodeTmp(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const report = new ConversionReport('tmp')
	const warnings: WriteWarning[] = []
	const events = prepareEvents(document, report, warnings, { timeFormat: 'tmp' })

	let out = ''
	events.forEach((prepared, i) => {
		const { start, end } = prepared.event
		const next = events[i + 1]
		const implied = tmpEnd(quantizeTime(start, 'tmp'), next && quantizeTime(next.event.start, 'tmp'))
		if (implied !== end) {
			report.record('timePrecision', { eventIndex: prepared.index }, 'End time not representable')
		}

		out += `${formatTime(start, 'tmp')}:${encodeLineBreaks(visibleText(prepared.fragments), 'pipe')}\n`
	})

	return report.result(joinOutput(out, options), warnings)
}
