/**
 * JSON encoder
 */

import type { SubtitleDocument, WriteOptions, WriteResult, WriteWarning } from '@subforge/core'
import { joinOutput } from '../common/render'
import { ConversionReport } from '../policy'
import type { JsonDocument, JsonEvent } from './types'

/**
 * Encode a document as JSON
 * Nothing is lost; only dangling style references are resolved to Default.
 */
export function encodeJson(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const report = new ConversionReport('json')
	const warnings: WriteWarning[] = []

	const events = document.events.map((event, index): JsonEvent => {
		if (document.hasStyle(event.style)) return { ...event }
		warnings.push({
			code: 'UNRESOLVED_STYLE_REFERENCE',
			eventIndex: index,
			style: event.style,
			message: `Event ${index} refers to missing style "${event.style}", using Default`,
		})
		return { ...event, style: 'Default' }
	})

	const fps = options.fps ?? document.fps
	const json: JsonDocument = {
		info: Object.fromEntries(document.info),
		styles: [...document.styles].map(([name, style]) => ({ name, ...style })),
		events,
		extraSections: document.extraSections.map(section => ({ ...section, lines: [...section.lines] })),
		...(fps !== undefined ? { fps } : {}),
	}

	return report.result(joinOutput(`${JSON.stringify(json, null, 2)}\n`, options), warnings)
}
