/**
 * SubStation override tags
 *
 * Event text interleaves plain runs with `{...}` blocks of backslash
 * directives, e.g. `{\b1\c&H0000FF&}Bold red{\r} plain`. Blocks do not nest,
 * so one forward scan over three states is enough:
 *
 *   OUTSIDE --"{"--> INSIDE --"\"--> DIRECTIVE --"\"--> DIRECTIVE
 *      ^                |                |
 *      +------"}"-------+------"}"-------+
 *
 * Parentheses inside a directive (`\t(\b1)`, `\clip(...)`) are not split.
 */

import { formatTagColor, parseAssColor, type Color } from './color'
import { UnterminatedOverrideBlockError } from './errors'
import { cloneStyle, ssaToAssAlignment, type Style } from './style'

export type ColorSlot = 1 | 2 | 3 | 4

export type Directive =
	| { kind: 'bold'; value: boolean; weight?: number }
	| { kind: 'italic'; value: boolean }
	| { kind: 'underline'; value: boolean }
	| { kind: 'strikeout'; value: boolean }
	/** `color: null` restores the style color */
	| { kind: 'color'; slot: ColorSlot; color: Color | null }
	/** slot 0 is `\alpha` (all four colors) */
	| { kind: 'alpha'; slot: ColorSlot | 0; alpha: number }
	| { kind: 'fontName'; value: string }
	| { kind: 'fontSize'; value: number }
	/** `legacy` keeps the SSA `\a` code when the tag was written that way */
	| { kind: 'alignment'; value: number; legacy?: number }
	| { kind: 'position'; x: number; y: number }
	| { kind: 'drawing'; scale: number }
	/** empty style name resets to the event style */
	| { kind: 'reset'; style: string }
	| { kind: 'comment'; text: string }
	/** anything else, kept verbatim (without the leading backslash) */
	| { kind: 'unknown'; raw: string }

/**
 * Directives introduced right before a run of text
 */
export interface TagRun {
	readonly directives: readonly Directive[]
	readonly text: string
}

export interface ScanOptions {
	/** Treat an unterminated "{" as literal text instead of throwing */
	lenient?: boolean
}

type ScanState = 'outside' | 'inside' | 'directive'

/**
 * Lazily scan event text into runs
 * The returned iterable rescans the text on every iteration
 */
export function scanTags(text: string, options: ScanOptions = {}): Iterable<TagRun> {
	const lenient = options.lenient ?? false
	return {
		[Symbol.iterator]: () => scan(text, lenient),
	}
}

/**
 * Scan event text into an array of runs
 */
export function parseTags(text: string, options: ScanOptions = {}): TagRun[] {
	return [...scanTags(text, options)]
}

function* scan(text: string, lenient: boolean): Generator<TagRun> {
	let state: ScanState = 'outside'
	let runText = ''
	let directives: Directive[] = []
	let block: Directive[] = []
	let buffer = ''
	let depth = 0
	let blockStart = -1

	const closeBlock = (): TagRun | null => {
		state = 'outside'
		if (runText === '') {
			directives.push(...block)
			return null
		}
		const run: TagRun = { directives, text: runText }
		directives = block
		runText = ''
		return run
	}

	for (let i = 0; i < text.length; i++) {
		const char = text[i]!

		switch (state) {
			case 'outside':
				if (char === '{') {
					state = 'inside'
					blockStart = i
					block = []
					buffer = ''
				} else {
					runText += char
				}
				break

			case 'inside':
				if (char === '\\' || char === '}') {
					if (buffer) block.push({ kind: 'comment', text: buffer })
					buffer = ''
					depth = 0
					if (char === '\\') {
						state = 'directive'
					} else {
						const run = closeBlock()
						if (run) yield run
					}
				} else {
					buffer += char
				}
				break

			case 'directive':
				if (char === '(') {
					depth++
					buffer += char
				} else if (char === ')') {
					depth = Math.max(0, depth - 1)
					buffer += char
				} else if (char === '}' || (depth === 0 && char === '\\')) {
					// "}" closes the block even inside an unbalanced "("
					if (buffer) block.push(parseDirective(buffer))
					buffer = ''
					depth = 0
					if (char === '}') {
						const run = closeBlock()
						if (run) yield run
					}
				} else {
					buffer += char
				}
				break
		}
	}

	if (state !== 'outside') {
		if (!lenient) throw new UnterminatedOverrideBlockError(blockStart)
		runText += text.slice(blockStart)
	}

	if (runText !== '' || directives.length > 0) {
		yield { directives, text: runText }
	}
}

/**
 * Parse one directive body (text after the backslash)
 */
export function parseDirective(body: string): Directive {
	let match: RegExpMatchArray | null

	if ((match = body.match(/^([1-4])?c(&?H[0-9A-Fa-f]+&?)?$/))) {
		const slot = toSlot(match[1])
		if (!match[2]) return { kind: 'color', slot, color: null }
		const color = parseAssColor(match[2])
		if (color) return { kind: 'color', slot, color: { ...color, a: 0 } }
	}
	if ((match = body.match(/^(?:([1-4])a|alpha)&?H([0-9A-Fa-f]{1,2})&?$/))) {
		return { kind: 'alpha', slot: match[1] ? toSlot(match[1]) : 0, alpha: parseInt(match[2]!, 16) }
	}
	if ((match = body.match(/^an([1-9])$/))) {
		return { kind: 'alignment', value: parseInt(match[1]!, 10) }
	}
	if ((match = body.match(/^a(\d{1,2})$/))) {
		const legacy = parseInt(match[1]!, 10)
		return { kind: 'alignment', value: ssaToAssAlignment(legacy), legacy }
	}
	if ((match = body.match(/^b(\d+)$/))) {
		const n = parseInt(match[1]!, 10)
		return n > 1 ? { kind: 'bold', value: n >= 700, weight: n } : { kind: 'bold', value: n === 1 }
	}
	if ((match = body.match(/^([ius])([01])$/))) {
		const value = match[2] === '1'
		if (match[1] === 'i') return { kind: 'italic', value }
		if (match[1] === 'u') return { kind: 'underline', value }
		return { kind: 'strikeout', value }
	}
	if ((match = body.match(/^fn(.+)$/))) {
		return { kind: 'fontName', value: match[1]! }
	}
	if ((match = body.match(/^fs(\d+(?:\.\d+)?)$/))) {
		return { kind: 'fontSize', value: parseFloat(match[1]!) }
	}
	if ((match = body.match(/^pos\(\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\)$/))) {
		return { kind: 'position', x: parseFloat(match[1]!), y: parseFloat(match[2]!) }
	}
	if ((match = body.match(/^p(\d+)$/))) {
		return { kind: 'drawing', scale: parseInt(match[1]!, 10) }
	}
	if ((match = body.match(/^r(.*)$/))) {
		return { kind: 'reset', style: match[1]! }
	}

	return { kind: 'unknown', raw: body }
}

function toSlot(digit: string | undefined): ColorSlot {
	switch (digit) {
		case '2':
			return 2
		case '3':
			return 3
		case '4':
			return 4
		default:
			return 1
	}
}

/**
 * Format a directive back to its tag text
 */
export function formatDirective(directive: Directive): string {
	switch (directive.kind) {
		case 'bold':
			return `\\b${directive.weight ?? (directive.value ? 1 : 0)}`
		case 'italic':
			return `\\i${directive.value ? 1 : 0}`
		case 'underline':
			return `\\u${directive.value ? 1 : 0}`
		case 'strikeout':
			return `\\s${directive.value ? 1 : 0}`
		case 'color': {
			const prefix = directive.slot === 1 ? '\\c' : `\\${directive.slot}c`
			return directive.color ? prefix + formatTagColor(directive.color) : prefix
		}
		case 'alpha': {
			const hex = directive.alpha.toString(16).toUpperCase().padStart(2, '0')
			return directive.slot === 0 ? `\\alpha&H${hex}&` : `\\${directive.slot}a&H${hex}&`
		}
		case 'fontName':
			return `\\fn${directive.value}`
		case 'fontSize':
			return `\\fs${directive.value}`
		case 'alignment':
			return directive.legacy !== undefined ? `\\a${directive.legacy}` : `\\an${directive.value}`
		case 'position':
			return `\\pos(${directive.x},${directive.y})`
		case 'drawing':
			return `\\p${directive.scale}`
		case 'reset':
			return `\\r${directive.style}`
		case 'comment':
			return directive.text
		case 'unknown':
			return `\\${directive.raw}`
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

type AttributeState = Map<string, string>

/**
 * Attributes a directive sets, as (attribute, normalized value) pairs
 */
function directiveState(directive: Directive): [string, string][] {
	switch (directive.kind) {
		case 'bold':
			return [['bold', String(directive.weight ?? (directive.value ? 1 : 0))]]
		case 'italic':
		case 'underline':
		case 'strikeout':
			return [[directive.kind, directive.value ? '1' : '0']]
		case 'color':
			return [[`color${directive.slot}`, directive.color ? formatTagColor(directive.color) : 'style']]
		case 'alpha': {
			const slots = directive.slot === 0 ? [1, 2, 3, 4] : [directive.slot]
			return slots.map(slot => [`alpha${slot}`, String(directive.alpha)])
		}
		case 'fontName':
			return [['fontName', directive.value]]
		case 'fontSize':
			return [['fontSize', String(directive.value)]]
		case 'alignment':
			return [['alignment', String(directive.value)]]
		case 'position':
			return [['position', `${directive.x},${directive.y}`]]
		case 'drawing':
			return [['drawing', String(directive.scale)]]
		case 'reset':
		case 'comment':
		case 'unknown':
			return []
	}
}

function baseState(base?: Style): AttributeState {
	const state: AttributeState = new Map([['drawing', '0']])
	if (!base) return state

	state.set('bold', base.bold ? '1' : '0')
	state.set('italic', base.italic ? '1' : '0')
	state.set('underline', base.underline ? '1' : '0')
	state.set('strikeout', base.strikeout ? '1' : '0')
	const colors = [base.primaryColor, base.secondaryColor, base.outlineColor, base.backColor]
	colors.forEach((color, i) => {
		state.set(`color${i + 1}`, formatTagColor(color))
		state.set(`alpha${i + 1}`, String(color.a))
	})
	state.set('fontName', base.fontName)
	state.set('fontSize', String(base.fontSize))
	state.set('alignment', String(base.alignment))
	return state
}

/**
 * Serialize runs back to event text
 *
 * Each run's directives become at most one block; directives that would not
 * change the attribute state since the last change are omitted. With `base`,
 * the initial state is that style's attributes.
 */
export function serializeTags(runs: Iterable<TagRun>, base?: Style): string {
	const initial = baseState(base)
	let state = new Map(initial)
	let out = ''

	for (const run of runs) {
		const blocks: string[][] = [[]]

		for (const directive of run.directives) {
			let current = blocks[blocks.length - 1]!

			if (directive.kind === 'reset') {
				// a named style is unknown here, so nothing is assumed after it
				state = directive.style === '' ? new Map(initial) : new Map()
			} else {
				const entries = directiveState(directive)
				if (entries.length > 0 && entries.every(([key, value]) => state.get(key) === value)) {
					continue
				}
				for (const [key, value] of entries) state.set(key, value)
			}

			// block comments must lead their block
			if (directive.kind === 'comment' && current.length > 0) {
				current = []
				blocks.push(current)
			}
			current.push(formatDirective(directive))
		}

		for (const block of blocks) {
			if (block.length > 0) out += `{${block.join('')}}`
		}
		out += run.text
	}

	return out
}

// ─────────────────────────────────────────────────────────────────────────────
// Effective styles
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A run of text with the style in effect for it
 */
export interface StyledFragment {
	text: string
	style: Style
	drawing: boolean
	directives: readonly Directive[]
}

/**
 * Resolve the effective style of every run
 * `\r` resets to `base`, or to the named entry of `styles`
 */
export function styledFragments(
	text: string,
	base: Style,
	styles?: ReadonlyMap<string, Style>,
	options: ScanOptions = {}
): StyledFragment[] {
	const fragments: StyledFragment[] = []
	let style = cloneStyle(base)
	let drawing = false

	for (const run of scanTags(text, options)) {
		for (const directive of run.directives) {
			switch (directive.kind) {
				case 'reset':
					style = cloneStyle((directive.style && styles?.get(directive.style)) || base)
					break
				case 'drawing':
					drawing = directive.scale > 0
					break
				default:
					style = applyDirective(style, directive, base)
			}
		}
		fragments.push({ text: run.text, style, drawing, directives: run.directives })
	}

	return fragments
}

const COLOR_ATTRIBUTES = ['primaryColor', 'secondaryColor', 'outlineColor', 'backColor'] as const

function applyDirective(style: Style, directive: Directive, base: Style): Style {
	switch (directive.kind) {
		case 'bold':
			return { ...style, bold: directive.value }
		case 'italic':
			return { ...style, italic: directive.value }
		case 'underline':
			return { ...style, underline: directive.value }
		case 'strikeout':
			return { ...style, strikeout: directive.value }
		case 'color': {
			const key = COLOR_ATTRIBUTES[directive.slot - 1]!
			const color = directive.color ?? base[key]
			const next = { ...style }
			next[key] = { ...color, a: style[key].a }
			return next
		}
		case 'alpha': {
			const next = { ...style }
			COLOR_ATTRIBUTES.forEach((key, i) => {
				if (directive.slot === 0 || directive.slot === i + 1) {
					next[key] = { ...style[key], a: directive.alpha }
				}
			})
			return next
		}
		case 'fontName':
			return { ...style, fontName: directive.value }
		case 'fontSize':
			return { ...style, fontSize: directive.value }
		case 'alignment':
			return { ...style, alignment: directive.value }
		default:
			return style
	}
}

/**
 * Remove all override blocks
 */
export function stripTags(text: string): string {
	return text.replace(/\{[^}]*\}/g, '')
}
