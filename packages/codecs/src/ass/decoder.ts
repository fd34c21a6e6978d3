/**
 * ASS/SSA subtitle decoder
 * Parses Advanced SubStation Alpha and SubStation Alpha v4 scripts
 */

import {
	DEFAULT_STYLE_NAME,
	SubtitleDocument,
	createStyle,
	UnterminatedOverrideBlockError,
	normalizeLineBreaks,
	parseAssColor,
	parseTags,
	parseTime,
	ssaToAssAlignment,
	type Color,
	type EventType,
	type ExtraSection,
	type ReadOptions,
	type ReadResult,
	type Style,
} from '@subforge/core'
import { ParseContext, splitLines, type SourceLine } from '../common/parse'
import { ASS_EVENT_FIELDS, ASS_STYLE_FIELDS, SSA_EVENT_FIELDS, SSA_STYLE_FIELDS, type SubStationVariant } from './types'

type Section =
	| { kind: 'none' }
	| { kind: 'info' }
	| { kind: 'styles'; ssa: boolean; format: string[] }
	| { kind: 'events'; format: string[] }
	| { kind: 'extra'; section: ExtraSection }

/**
 * Check if text is ASS/SSA
 */
export function isAss(text: string): boolean {
	return /^\s*\[Script Info\]/im.test(text)
}

/**
 * Detect dialect (ASS vs SSA)
 */
export function detectAssFormat(text: string): SubStationVariant {
	if (/^ScriptType:\s*v4\.00\+/im.test(text) || /^\s*\[V4\+ Styles\]/im.test(text)) {
		return 'ass'
	}
	if (/^ScriptType:\s*v4\.00\s*$/im.test(text) || /^\s*\[V4 Styles\]/im.test(text)) {
		return 'ssa'
	}

	// Default to ASS (more common)
	return 'ass'
}

/**
 * Decode ASS/SSA script
 *
 * Field order follows each section's Format line. Sections other than
 * [Script Info], styles and [Events] ([Fonts], [Graphics], editor data)
 * are kept verbatim for write-back.
 */
export function decodeAss(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const variant = detectAssFormat(text)
	const document = new SubtitleDocument()
	document.format = variant

	const seenStyles = new Set<string>()
	let section: Section = { kind: 'none' }

	for (const line of splitLines(text)) {
		const trimmed = line.text.trim()
		if (!trimmed) continue

		// Section headers
		const header = trimmed.match(/^\[(.+)\]$/)
		if (header) {
			section = openSection(header[1]!, variant, document)
			continue
		}

		switch (section.kind) {
			case 'none':
				if (!trimmed.startsWith(';')) context.fail(line.number, 'Expected a section header')
				break

			case 'info':
				if (!trimmed.startsWith(';')) parseScriptInfoLine(trimmed, document)
				break

			case 'styles':
				if (trimmed.startsWith('Format:')) {
					section.format = parseFormatLine(trimmed.slice(7))
				} else if (trimmed.startsWith('Style:')) {
					parseStyleLine(line, trimmed.slice(6), section, document, seenStyles, context)
				}
				break

			case 'events':
				if (trimmed.startsWith('Format:')) {
					section.format = parseFormatLine(trimmed.slice(7))
				} else if (trimmed.startsWith('Dialogue:')) {
					parseEventLine(line, trimmed.slice(9), 'Dialogue', section.format, document, context)
				} else if (trimmed.startsWith('Comment:')) {
					parseEventLine(line, trimmed.slice(8), 'Comment', section.format, document, context)
				}
				break

			case 'extra':
				section.section.lines.push(line.text)
				break
		}
	}

	document.orderStyles(seenStyles)
	return { document, warnings: context.warnings }
}

function openSection(name: string, variant: SubStationVariant, document: SubtitleDocument): Section {
	switch (name.toLowerCase()) {
		case 'script info':
			return { kind: 'info' }
		case 'v4 styles':
			return { kind: 'styles', ssa: true, format: formatOf(SSA_STYLE_FIELDS) }
		case 'v4+ styles':
		case 'v4 styles+':
			return { kind: 'styles', ssa: false, format: formatOf(ASS_STYLE_FIELDS) }
		case 'events':
			return { kind: 'events', format: formatOf(variant === 'ssa' ? SSA_EVENT_FIELDS : ASS_EVENT_FIELDS) }
		default: {
			const section: ExtraSection = { format: 'ass', name, lines: [] }
			document.extraSections.push(section)
			return { kind: 'extra', section }
		}
	}
}

function formatOf(fields: readonly string[]): string[] {
	return fields.map(field => field.toLowerCase())
}

function parseFormatLine(line: string): string[] {
	return line.split(',').map(s => s.trim().toLowerCase())
}

/**
 * Parse Script Info line
 */
function parseScriptInfoLine(line: string, document: SubtitleDocument): void {
	const colonIndex = line.indexOf(':')
	if (colonIndex === -1) return

	document.info.set(line.slice(0, colonIndex).trim(), line.slice(colonIndex + 1).trim())
}

/**
 * Parse Style line; a repeated name is malformed, lenient reads keep the later one
 */
function parseStyleLine(
	line: SourceLine,
	body: string,
	section: { ssa: boolean; format: string[] },
	document: SubtitleDocument,
	seen: Set<string>,
	context: ParseContext
): void {
	const { format } = section
	const parts = splitAssLine(body, format.length)
	if (parts.length < format.length) {
		context.fail(line.number, `Style line has ${parts.length} fields, expected ${format.length}`)
		return
	}

	const style = createStyle()
	let name = DEFAULT_STYLE_NAME

	for (let i = 0; i < format.length; i++) {
		const key = format[i]!
		const value = parts[i]!.trim()

		if (key === 'name') {
			name = value
		} else if (!applyStyleField(style, key, value, section.ssa)) {
			context.fail(line.number, `Malformed ${key} value ${JSON.stringify(value)}`)
			return
		}
	}

	if (seen.has(name)) {
		context.fail(line.number, `Duplicate style "${name}"`, 'DUPLICATE_STYLE')
	}
	seen.add(name)
	document.setStyle(name, style)
}

/**
 * Set one style attribute; false when the value does not parse
 */
function applyStyleField(style: Style, key: string, value: string, ssa: boolean): boolean {
	switch (key) {
		case 'fontname':
			style.fontName = value
			return true
		case 'fontsize':
			return setNumber(value, n => {
				style.fontSize = n
			})
		case 'primarycolour':
			return setColor(value, c => {
				style.primaryColor = c
			})
		case 'secondarycolour':
			return setColor(value, c => {
				style.secondaryColor = c
			})
		case 'outlinecolour':
		case 'tertiarycolour':
			return setColor(value, c => {
				style.outlineColor = c
			})
		case 'backcolour':
			return setColor(value, c => {
				style.backColor = c
			})
		case 'bold':
			style.bold = isSet(value)
			return true
		case 'italic':
			style.italic = isSet(value)
			return true
		case 'underline':
			style.underline = isSet(value)
			return true
		case 'strikeout':
			style.strikeout = isSet(value)
			return true
		case 'scalex':
			return setNumber(value, n => {
				style.scaleX = n
			})
		case 'scaley':
			return setNumber(value, n => {
				style.scaleY = n
			})
		case 'spacing':
			return setNumber(value, n => {
				style.spacing = n
			})
		case 'angle':
			return setNumber(value, n => {
				style.angle = n
			})
		case 'borderstyle':
			return setNumber(value, n => {
				style.borderStyle = n
			})
		case 'outline':
			return setNumber(value, n => {
				style.outline = n
			})
		case 'shadow':
			return setNumber(value, n => {
				style.shadow = n
			})
		case 'alignment':
			return setNumber(value, n => {
				style.alignment = ssa ? ssaToAssAlignment(n) : n
			})
		case 'marginl':
			return setNumber(value, n => {
				style.marginL = n
			})
		case 'marginr':
			return setNumber(value, n => {
				style.marginR = n
			})
		case 'marginv':
			return setNumber(value, n => {
				style.marginV = n
			})
		case 'encoding':
			return setNumber(value, n => {
				style.encoding = n
			})
		default:
			// AlphaLevel and unknown fields
			return true
	}
}

function setNumber(value: string, set: (n: number) => void): boolean {
	const n = Number(value)
	if (value === '' || !Number.isFinite(n)) return false
	set(n)
	return true
}

function setColor(value: string, set: (c: Color) => void): boolean {
	const color = parseAssColor(value)
	if (!color) return false
	set(color)
	return true
}

// -1 in ASS, 1 in some writers
function isSet(value: string): boolean {
	return value !== '0' && value !== ''
}

/**
 * Parse Dialogue or Comment line
 */
function parseEventLine(
	line: SourceLine,
	body: string,
	type: EventType,
	format: string[],
	document: SubtitleDocument,
	context: ParseContext
): void {
	const parts = splitAssLine(body, format.length)
	if (parts.length < format.length) {
		context.fail(line.number, `${type} line has ${parts.length} fields, expected ${format.length}`)
		return
	}

	const field = (name: string): string | undefined => {
		const i = format.indexOf(name)
		return i === -1 ? undefined : parts[i]
	}

	const start = field('start')
	const end = field('end')
	const text = field('text')
	if (start === undefined || end === undefined || text === undefined) {
		context.fail(line.number, 'Event format lacks Start, End or Text')
		return
	}

	const eventText = normalizeLineBreaks(text, 'ass')
	checkOverrideBlocks(eventText, line.number, context)

	context.attempt(line.number, () =>
		document.addEvent(
			context.withLanguage({
				start: parseTime(start.trim(), 'ass'),
				end: parseTime(end.trim(), 'ass'),
				text: eventText,
				style: field('style')?.trim() || DEFAULT_STYLE_NAME,
				layer: toInt(field('layer')),
				name: (field('name') ?? field('actor') ?? '').trim(),
				marginL: toInt(field('marginl')),
				marginR: toInt(field('marginr')),
				marginV: toInt(field('marginv')),
				effect: (field('effect') ?? '').trim(),
				type,
				marked: /^(?:Marked=)?1$/i.test((field('marked') ?? '').trim()),
			})
		)
	)
}

/**
 * An orphan "{" fails strict reads; lenient reads keep the event and the
 * brace stays literal text
 */
function checkOverrideBlocks(text: string, line: number, context: ParseContext): void {
	try {
		parseTags(text)
	} catch (error) {
		if (!(error instanceof UnterminatedOverrideBlockError)) throw error
		context.fail(line, error.message, 'UNTERMINATED_OVERRIDE_BLOCK')
	}
}

function toInt(value: string | undefined): number {
	const n = parseInt(value ?? '', 10)
	return Number.isFinite(n) ? n : 0
}

/**
 * Split ASS line (text field can contain commas)
 */
export function splitAssLine(line: string, fieldCount: number): string[] {
	const parts: string[] = []
	let current = ''
	let commaCount = 0

	for (let i = 0; i < line.length; i++) {
		const char = line[i]!

		if (char === ',' && commaCount < fieldCount - 1) {
			parts.push(current)
			current = ''
			commaCount++
		} else {
			current += char
		}
	}

	parts.push(current)
	return parts
}
