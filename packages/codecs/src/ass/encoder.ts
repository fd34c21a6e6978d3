/**
 * ASS/SSA subtitle encoder
 */

import {
	DEFAULT_STYLE,
	assToSsaAlignment,
	encodeLineBreaks,
	formatAssColor,
	formatSsaColor,
	formatTime,
	quantizeTime,
	type Color,
	type Style,
	type SubtitleDocument,
	type SubtitleEvent,
	type WriteOptions,
	type WriteResult,
	type WriteWarning,
} from '@subforge/core'
import { joinOutput } from '../common/render'
import { ConversionReport } from '../policy'
import {
	ASS_EVENT_FIELDS,
	ASS_STYLE_FIELDS,
	SCRIPT_TYPE,
	SSA_EVENT_FIELDS,
	SSA_STYLE_FIELDS,
	STYLES_SECTION,
	type SubStationVariant,
} from './types'

// Style attributes with no [V4 Styles] field
const SSA_MISSING = ['underline', 'strikeout', 'scaleX', 'scaleY', 'spacing', 'angle'] as const

/**
 * Encode a document as an ASS (default) or SSA script
 */
export function encodeAss(document: SubtitleDocument, options: WriteOptions = {}): WriteResult {
	const variant = options.variant ?? 'ass'
	const report = new ConversionReport(variant)
	const warnings: WriteWarning[] = []

	const info = ['[Script Info]', '; Script generated by subforge', `ScriptType: ${SCRIPT_TYPE[variant]}`]
	for (const [key, value] of document.info) {
		if (key !== 'ScriptType') info.push(`${key}: ${value}`)
	}

	const styles = [`[${STYLES_SECTION[variant]}]`, formatLine(variant === 'ssa' ? SSA_STYLE_FIELDS : ASS_STYLE_FIELDS)]
	for (const [name, style] of document.styles) {
		if (variant === 'ssa') {
			const lost = SSA_MISSING.filter(key => style[key] !== DEFAULT_STYLE[key])
			if (lost.length > 0) {
				report.record('styleAttributes', { style: name }, `Style attributes dropped: ${lost.join(', ')}`)
			}
		}
		styles.push(`Style: ${styleFields(name, style, variant).join(',')}`)
	}

	const events = ['[Events]', formatLine(variant === 'ssa' ? SSA_EVENT_FIELDS : ASS_EVENT_FIELDS)]
	document.events.forEach((event, index) => {
		let style = event.style
		if (!document.hasStyle(style)) {
			warnings.push({
				code: 'UNRESOLVED_STYLE_REFERENCE',
				eventIndex: index,
				style,
				message: `Event ${index} refers to missing style "${style}", using Default`,
			})
			style = 'Default'
		}

		if (quantizeTime(event.start, 'ass') !== event.start || quantizeTime(event.end, 'ass') !== event.end) {
			report.record('timePrecision', { eventIndex: index }, 'Times rounded to ass resolution')
		}
		if (variant === 'ssa' && event.layer !== 0) {
			report.record('eventFields', { eventIndex: index }, 'Event fields dropped: layer')
		}

		events.push(`${event.type}: ${eventFields(event, style, variant).join(',')}`)
	})

	const sections = [info, styles, events]
	for (const section of document.extraSections) {
		if (section.format === 'ass') sections.push([`[${section.name}]`, ...section.lines])
	}

	const text = sections.map(lines => lines.join('\n')).join('\n\n') + '\n'
	return report.result(joinOutput(text, options), warnings)
}

function formatLine(fields: readonly string[]): string {
	return `Format: ${fields.join(', ')}`
}

function styleFields(name: string, style: Style, variant: SubStationVariant): string[] {
	const color = (c: Color) => (variant === 'ssa' ? formatSsaColor(c) : formatAssColor(c))
	const flag = (value: boolean) => (value ? '-1' : '0')
	const margins = [style.marginL, style.marginR, style.marginV].map(String)

	if (variant === 'ssa') {
		return [
			field(name),
			style.fontName,
			String(style.fontSize),
			color(style.primaryColor),
			color(style.secondaryColor),
			color(style.outlineColor),
			color(style.backColor),
			flag(style.bold),
			flag(style.italic),
			String(style.borderStyle),
			String(style.outline),
			String(style.shadow),
			String(assToSsaAlignment(style.alignment)),
			...margins,
			// AlphaLevel, unused
			'0',
			String(style.encoding),
		]
	}

	return [
		field(name),
		style.fontName,
		String(style.fontSize),
		color(style.primaryColor),
		color(style.secondaryColor),
		color(style.outlineColor),
		color(style.backColor),
		flag(style.bold),
		flag(style.italic),
		flag(style.underline),
		flag(style.strikeout),
		String(style.scaleX),
		String(style.scaleY),
		String(style.spacing),
		String(style.angle),
		String(style.borderStyle),
		String(style.outline),
		String(style.shadow),
		String(style.alignment),
		...margins,
		String(style.encoding),
	]
}

function eventFields(event: SubtitleEvent, style: string, variant: SubStationVariant): string[] {
	return [
		variant === 'ssa' ? `Marked=${event.marked ? 1 : 0}` : String(event.layer),
		formatTime(event.start, 'ass'),
		formatTime(event.end, 'ass'),
		field(style),
		field(event.name),
		String(event.marginL),
		String(event.marginR),
		String(event.marginV),
		field(event.effect),
		encodeLineBreaks(event.text, 'ass'),
	]
}

// a comma would shift every following field
function field(value: string): string {
	return value.replace(/,/g, ';')
}
