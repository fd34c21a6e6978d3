/**
 * JSON decoder
 * Input is validated field by field; a record that does not fit is malformed.
 */

import {
	SubtitleDocument,
	createColor,
	createStyle,
	type Color,
	type EventInit,
	type EventType,
	type ExtraSection,
	type ReadOptions,
	type ReadResult,
	type Style,
} from '@subforge/core'
import { ParseContext } from '../common/parse'
import { BOOLEAN_STYLE_KEYS, COLOR_STYLE_KEYS, NUMBER_STYLE_KEYS, STRING_STYLE_KEYS } from './types'

type JsonObject = Record<string, unknown>

// JSON has no records per line
const LINE = 1

function isObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isArray(value: unknown): value is unknown[] {
	return Array.isArray(value)
}

function isString(value: unknown): value is string {
	return typeof value === 'string'
}

function isEventType(value: unknown): value is EventType {
	return value === 'Dialogue' || value === 'Comment'
}

function isSectionFormat(value: unknown): value is ExtraSection['format'] {
	return value === 'ass' || value === 'vtt'
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}

/**
 * Check if text is a subforge JSON document
 */
export function isJson(text: string): boolean {
	if (!text.trimStart().startsWith('{')) return false
	const value = parseJson(text)
	return isObject(value) && isArray(value.events)
}

/**
 * Decode JSON text
 */
export function decodeJson(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'json'

	const root = parseJson(text)
	if (!isObject(root) || !isArray(root.events)) {
		context.fail(LINE, 'Expected a JSON object with an events array')
		return { document, warnings: context.warnings }
	}

	if (isObject(root.info)) {
		for (const [key, value] of Object.entries(root.info)) {
			if (typeof value === 'string') document.info.set(key, value)
			else context.fail(LINE, `Info field ${JSON.stringify(key)} is not a string`)
		}
	}

	if (isArray(root.styles)) {
		const seen = new Set<string>()
		for (const value of root.styles) {
			const name = isObject(value) ? value.name : undefined
			const style = readStyle(value)
			if (typeof name !== 'string' || !style) {
				context.fail(LINE, 'Malformed style record')
				continue
			}
			if (seen.has(name)) {
				context.fail(LINE, `Duplicate style ${JSON.stringify(name)}`, 'DUPLICATE_STYLE')
			}
			seen.add(name)
			document.setStyle(name, style)
		}
		document.orderStyles(seen)
	}

	root.events.forEach((value, index) => {
		const init = readEvent(value)
		if (!init) {
			context.fail(LINE, `Malformed event record ${index}`)
			return
		}
		context.attempt(LINE, () => document.addEvent(init))
	})

	if (isArray(root.extraSections)) {
		for (const value of root.extraSections) {
			const section = readSection(value)
			if (section) document.extraSections.push(section)
			else context.fail(LINE, 'Malformed extra section')
		}
	}

	if (typeof root.fps === 'number' && root.fps > 0) document.fps = root.fps

	return { document, warnings: context.warnings }
}

function readStyle(value: unknown): Style | null {
	if (!isObject(value)) return null
	const style = createStyle()

	for (const key of STRING_STYLE_KEYS) {
		const field = value[key]
		if (field === undefined) continue
		if (typeof field !== 'string') return null
		style[key] = field
	}
	for (const key of BOOLEAN_STYLE_KEYS) {
		const field = value[key]
		if (field === undefined) continue
		if (typeof field !== 'boolean') return null
		style[key] = field
	}
	for (const key of NUMBER_STYLE_KEYS) {
		const field = value[key]
		if (field === undefined) continue
		if (typeof field !== 'number' || !Number.isFinite(field)) return null
		style[key] = field
	}
	for (const key of COLOR_STYLE_KEYS) {
		const field = value[key]
		if (field === undefined) continue
		const color = readColor(field)
		if (!color) return null
		style[key] = color
	}

	return style
}

function readColor(value: unknown): Color | null {
	if (!isObject(value)) return null
	const { r, g, b, a = 0 } = value
	if (typeof r !== 'number' || typeof g !== 'number' || typeof b !== 'number' || typeof a !== 'number') {
		return null
	}
	return createColor(r, g, b, a)
}

function readEvent(value: unknown): EventInit | null {
	if (!isObject(value)) return null
	const { start, end, text, style, layer, name, marginL, marginR, marginV, effect, type, marked, language } = value

	if (typeof start !== 'number' || typeof end !== 'number' || typeof text !== 'string') return null
	if (type !== undefined && !isEventType(type)) return null

	const asNumber = (field: unknown) => (typeof field === 'number' ? field : undefined)
	const asString = (field: unknown) => (typeof field === 'string' ? field : undefined)

	return {
		start,
		end,
		text,
		style: asString(style),
		layer: asNumber(layer),
		name: asString(name),
		marginL: asNumber(marginL),
		marginR: asNumber(marginR),
		marginV: asNumber(marginV),
		effect: asString(effect),
		type: isEventType(type) ? type : undefined,
		marked: typeof marked === 'boolean' ? marked : undefined,
		language: asString(language),
	}
}

function readSection(value: unknown): ExtraSection | null {
	if (!isObject(value)) return null
	const { format, name, lines } = value
	if (!isSectionFormat(format) || typeof name !== 'string' || !isArray(lines)) return null

	const strings = lines.filter(isString)
	return strings.length === lines.length ? { format, name, lines: strings } : null
}
