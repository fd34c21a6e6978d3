/**
 * Event preparation for targets without override tags
 * (SubRip, WebVTT, MicroDVD, MPL2, TMP)
 */

import {
	MAX_SRT_TIME,
	isComment,
	quantizeTime,
	styleDifferences,
	styledFragments,
	unescapeText,
	type Directive,
	type Feature,
	type Style,
	type StyledFragment,
	type SubtitleDocument,
	type SubtitleEvent,
	type TimeFormat,
	type WriteOptions,
	type WriteWarning,
} from '@subforge/core'
import type { ConversionReport } from '../policy'

export type EventField = 'layer' | 'name' | 'effect' | 'marginL' | 'marginR' | 'marginV' | 'marked'

export const EMPHASIS = ['bold', 'italic', 'underline', 'strikeout'] as const
export type Emphasis = (typeof EMPHASIS)[number]

export interface PreparedEvent {
	/** Position in the document */
	index: number
	event: SubtitleEvent
	style: Style
	/** Text fragments with their effective style, drawings removed */
	fragments: StyledFragment[]
}

export interface PrepareOptions {
	timeFormat: TimeFormat
	fps?: number
	/** Directive features the encoder reports itself */
	handles?: readonly Feature[]
	/** Style attributes the encoder writes */
	styleKeys?: readonly (keyof Style)[]
	/** Event fields the encoder writes */
	eventFields?: readonly EventField[]
	/** Override tags are passed through, nothing is lost to them */
	keepTags?: boolean
}

/**
 * Resolve styles and fragments of every writable event, recording what the
 * target loses on the way. Comments and drawings are left out.
 */
export function prepareEvents(
	document: SubtitleDocument,
	report: ConversionReport,
	warnings: WriteWarning[],
	options: PrepareOptions
): PreparedEvent[] {
	const prepared: PreparedEvent[] = []
	const handles = new Set<Feature>(options.handles)

	document.events.forEach((event, index) => {
		if (isComment(event)) {
			report.record('comment', { eventIndex: index }, 'Comment event left out')
			return
		}

		const resolved = document.resolveStyle(event.style)
		if (!resolved.resolved) {
			warnings.push({
				code: 'UNRESOLVED_STYLE_REFERENCE',
				eventIndex: index,
				style: event.style,
				message: `Event ${index} refers to missing style "${event.style}", using Default`,
			})
		}

		const fragments = styledFragments(event.text, resolved.style, document.styles, { lenient: true })
		if (fragments.some(fragment => fragment.drawing && fragment.text.trim() !== '')) {
			report.record('drawing', { eventIndex: index }, 'Drawing event left out')
			return
		}

		if (!options.keepTags) {
			for (const fragment of fragments) {
				for (const directive of fragment.directives) {
					const feature = directiveFeature(directive)
					if (feature && !handles.has(feature)) {
						report.record(feature, { eventIndex: index }, `Override tag ${describe(directive)} dropped`)
					}
				}
			}
		}

		const fields = lostEventFields(event, options.eventFields ?? [])
		if (fields.length > 0) {
			report.record('eventFields', { eventIndex: index }, `Event fields dropped: ${fields.join(', ')}`)
		}

		const expressed = new Set(options.styleKeys)
		const attributes = styleDifferences(resolved.style).filter(key => !expressed.has(key))
		if (attributes.length > 0) {
			report.record('styleAttributes', { style: resolved.name }, `Style attributes dropped: ${attributes.join(', ')}`)
		}

		recordTiming(event, index, report, options)

		prepared.push({
			index,
			event,
			style: resolved.style,
			fragments: fragments.filter(fragment => !fragment.drawing),
		})
	})

	return prepared
}

function directiveFeature(directive: Directive): Feature | null {
	switch (directive.kind) {
		case 'bold':
		case 'italic':
		case 'underline':
		case 'strikeout':
			return 'emphasis'
		case 'color':
		case 'alpha':
			return 'color'
		case 'position':
		case 'alignment':
			return 'position'
		case 'fontName':
		case 'fontSize':
			return 'font'
		case 'unknown':
			return 'unknownTag'
		case 'comment':
			return 'comment'
		case 'drawing':
		case 'reset':
			return null
	}
}

function describe(directive: Directive): string {
	return directive.kind === 'comment' ? `{${directive.text}}` : directive.kind === 'unknown' ? `\\${directive.raw}` : directive.kind
}

function lostEventFields(event: SubtitleEvent, written: readonly EventField[]): EventField[] {
	const lost: EventField[] = []
	const check = (field: EventField, set: boolean) => {
		if (set && !written.includes(field)) lost.push(field)
	}
	check('layer', event.layer !== 0)
	check('name', event.name !== '')
	check('effect', event.effect !== '')
	check('marginL', event.marginL !== 0)
	check('marginR', event.marginR !== 0)
	check('marginV', event.marginV !== 0)
	check('marked', event.marked)
	return lost
}

function recordTiming(event: SubtitleEvent, index: number, report: ConversionReport, options: PrepareOptions): void {
	const { timeFormat, fps } = options

	if (timeFormat === 'srt' && event.end > MAX_SRT_TIME) {
		report.record('timeOverflow', { eventIndex: index }, 'Time clamped to 99:59:59,999')
	}
	if (quantizeTime(event.start, timeFormat, fps) !== event.start || quantizeTime(event.end, timeFormat, fps) !== event.end) {
		report.record('timePrecision', { eventIndex: index }, `Times rounded to ${timeFormat} resolution`)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Visible text of a fragment (\h and soft \n decoded)
 */
export function fragmentText(fragment: StyledFragment): string {
	return unescapeText(fragment.text)
}

/**
 * Visible text of a prepared event
 */
export function visibleText(fragments: readonly StyledFragment[]): string {
	return fragments.map(fragmentText).join('')
}

/**
 * Emphasis flags used by any non-blank fragment
 */
export function usedEmphasis(fragments: readonly StyledFragment[]): Set<Emphasis> {
	const used = new Set<Emphasis>()
	for (const fragment of fragments) {
		if (fragmentText(fragment).trim() === '') continue
		for (const key of EMPHASIS) if (fragment.style[key]) used.add(key)
	}
	return used
}

/**
 * Emphasis flags shared by every non-blank fragment
 */
export function commonEmphasis(fragments: readonly StyledFragment[]): Set<Emphasis> {
	const visible = fragments.filter(fragment => fragmentText(fragment).trim() !== '')
	return new Set(EMPHASIS.filter(key => visible.length > 0 && visible.every(fragment => fragment.style[key])))
}

/**
 * Split fragments at line breaks
 */
export function splitFragmentLines(fragments: readonly StyledFragment[]): StyledFragment[][] {
	const lines: StyledFragment[][] = [[]]
	for (const fragment of fragments) {
		fragmentText(fragment)
			.split('\n')
			.forEach((part, i) => {
				if (i > 0) lines.push([])
				lines[lines.length - 1]!.push({ ...fragment, text: part })
			})
	}
	return lines
}

/**
 * Render fragments with HTML-like emphasis tags, nesting them minimally
 */
export function renderMarkup(
	fragments: readonly StyledFragment[],
	tags: Partial<Record<Emphasis, string>>,
	escape: (text: string) => string = text => text
): string {
	let out = ''
	let open: string[] = []

	for (const fragment of fragments) {
		const text = fragmentText(fragment)
		if (text === '') continue

		const wanted = EMPHASIS.flatMap(key => {
			const tag = tags[key]
			return fragment.style[key] && tag ? [tag] : []
		})

		let keep = 0
		while (keep < open.length && wanted.includes(open[keep]!)) keep++
		for (let i = open.length - 1; i >= keep; i--) out += `</${open[i]}>`
		open = open.slice(0, keep)

		for (const tag of wanted) {
			if (open.includes(tag)) continue
			out += `<${tag}>`
			open.push(tag)
		}
		out += escape(text)
	}

	for (let i = open.length - 1; i >= 0; i--) out += `</${open[i]}>`
	return out
}

/**
 * Join output lines with the requested line ending
 */
export function joinOutput(text: string, options: WriteOptions): string {
	return options.lineBreak === 'crlf' ? text.replace(/\n/g, '\r\n') : text
}
