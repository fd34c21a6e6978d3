/**
 * MicroDVD encoder
 */

import {
	DEFAULT_STYLE,
	MissingFrameRateError,
	formatTagColor,
	formatTime,
	type Color,
	type StyledFragment,
	type SubtitleDocument,
	type WriteOptions,
	type WriteResult,
	type WriteWarning,
} from '@subforge/core'
import {
	EMPHASIS,
	commonEmphasis,
	fragmentText,
	joinOutput,
	prepareEvents,
	splitFragmentLines,
	usedEmphasis,
	type Emphasis,
	type PreparedEvent,
} from '../common/render'
import { ConversionReport } from '../policy'

const EMPHASIS_CODES: Record<Emphasis, string> = { bold: 'b', italic: 'i', underline: 'u', strikeout: 's' }

/**
 * Encode a document as MicroDVD
 *
 * Frame rate comes from `options.fps`, then the document. Emphasis and
 * color are written per subtitle ({Y:}, {C:}) or per line ({y:}, {c:});
 * changes inside a line are approximated.
 */
export function encodeMicroDvd(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const fps = options.fps ?? document.fps
	if (fps === undefined) throw new MissingFrameRateError('MicroDVD output')

	const report = new ConversionReport('microdvd')
	const warnings: WriteWarning[] = []
	const events = prepareEvents(document, report, warnings, {
		timeFormat: 'microdvd',
		fps,
		handles: ['emphasis', 'color'],
		styleKeys: [...EMPHASIS, 'primaryColor'],
	})

	let out = (options.writeFpsDeclaration ?? true) ? `{1}{1}${fps}\n` : ''
	for (const prepared of events) {
		const { start, end } = prepared.event
		out += `{${formatTime(start, 'microdvd', fps)}}{${formatTime(end, 'microdvd', fps)}}${renderBody(prepared, report)}\n`
	}

	return report.result(joinOutput(out, options), warnings)
}

function renderBody(prepared: PreparedEvent, report: ConversionReport): string {
	const subject = { eventIndex: prepared.index }
	const global = commonEmphasis(prepared.fragments)
	const globalColor = uniformColor(prepared.fragments)

	const lines = splitFragmentLines(prepared.fragments).map(line => {
		const common = commonEmphasis(line)
		if ([...usedEmphasis(line)].some(key => !common.has(key))) {
			report.record('emphasis', subject, 'Emphasis inside a line not written')
		}

		let color = ''
		if (globalColor === 'mixed') {
			const lineColor = uniformColor(line)
			if (lineColor === 'mixed') report.record('color', subject, 'Color inside a line not written')
			else color = colorCode('c', lineColor)
		}

		const local = new Set([...common].filter(key => !global.has(key)))
		return emphasisCode('y', local) + color + line.map(fragment => fragment.text).join('')
	})

	const wholeColor = globalColor === 'mixed' ? '' : colorCode('C', globalColor)
	return emphasisCode('Y', global) + wholeColor + lines.join('|')
}

function emphasisCode(code: 'y' | 'Y', flags: ReadonlySet<Emphasis>): string {
	if (flags.size === 0) return ''
	return `{${code}:${EMPHASIS.filter(key => flags.has(key))
		.map(key => EMPHASIS_CODES[key])
		.join(',')}}`
}

function colorCode(code: 'c' | 'C', color: Color | null): string {
	// &HBBGGRR& -> $BBGGRR
	return color ? `{${code}:$${formatTagColor(color).slice(2, 8)}}` : ''
}

/**
 * Primary color shared by every visible fragment, null when it is the
 * default white
 */
function uniformColor(fragments: readonly StyledFragment[]): Color | null | 'mixed' {
	const visible = fragments.filter(fragment => fragmentText(fragment).trim() !== '')
	const first = visible[0]?.style.primaryColor
	if (!first) return null

	const same = (color: Color) => color.r === first.r && color.g === first.g && color.b === first.b
	if (!visible.every(fragment => same(fragment.style.primaryColor))) return 'mixed'
	return same(DEFAULT_STYLE.primaryColor) ? null : first
}
