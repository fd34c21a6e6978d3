/**
 * Subtitle events
 * Immutable records; edits return new events
 */

import { InvalidTimingError } from './errors'
import { DEFAULT_STYLE, DEFAULT_STYLE_NAME } from './style'
import { scanTags, styledFragments } from './tags'
import { shiftTime } from './time'
import type { Time } from './types'

export type EventType = 'Dialogue' | 'Comment'

export interface SubtitleEvent {
	readonly start: Time
	readonly end: Time
	/** Text with override tags; line breaks are always "\n" */
	readonly text: string
	/** Style name, resolved against the owning document */
	readonly style: string
	readonly layer: number
	/** Actor */
	readonly name: string
	/** Margin overrides, 0 means "use the style's" */
	readonly marginL: number
	readonly marginR: number
	readonly marginV: number
	readonly effect: string
	readonly type: EventType
	/** SSA "Marked" field */
	readonly marked: boolean
	/** Language tag from a language-detection collaborator */
	readonly language?: string
}

export type EventInit = Pick<SubtitleEvent, 'start' | 'end' | 'text'> &
	Partial<Omit<SubtitleEvent, 'start' | 'end' | 'text'>>

/**
 * Native line-break encodings
 * - newline: CR, LF or CRLF
 * - ass: the \N forced break
 * - pipe: "|" (MicroDVD, MPL2, TMP)
 */
export type LineBreakEncoding = 'newline' | 'ass' | 'pipe'

/**
 * Create an event, failing on invalid timing
 */
export function createEvent(init: EventInit): SubtitleEvent {
	checkTime(init.start, 'start')
	checkTime(init.end, 'end')
	if (init.end < init.start) {
		throw new InvalidTimingError(`Event ends (${init.end} ms) before it starts (${init.start} ms)`)
	}

	return {
		start: init.start,
		end: init.end,
		text: normalizeLineBreaks(init.text),
		style: init.style ?? DEFAULT_STYLE_NAME,
		layer: init.layer ?? 0,
		name: init.name ?? '',
		marginL: init.marginL ?? 0,
		marginR: init.marginR ?? 0,
		marginV: init.marginV ?? 0,
		effect: init.effect ?? '',
		type: init.type ?? 'Dialogue',
		marked: init.marked ?? false,
		...(init.language !== undefined ? { language: init.language } : {}),
	}
}

function checkTime(value: number, field: string): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new InvalidTimingError(`Event ${field} must be a non-negative integer of milliseconds, got ${value}`)
	}
}

export function eventDuration(event: SubtitleEvent): number {
	return event.end - event.start
}

/**
 * Move an event in time; times clamp at zero
 */
export function shiftEvent(event: SubtitleEvent, delta: number): SubtitleEvent {
	return createEvent({ ...event, start: shiftTime(event.start, delta), end: shiftTime(event.end, delta) })
}

/**
 * Stretch an event's timing around a pivot time
 */
export function scaleEvent(event: SubtitleEvent, factor: number, pivot: Time = 0): SubtitleEvent {
	if (!Number.isFinite(factor) || factor <= 0) {
		throw new InvalidTimingError(`Scale factor must be a positive number, got ${factor}`)
	}
	const scale = (time: Time) => Math.max(0, Math.round(pivot + (time - pivot) * factor))
	return createEvent({ ...event, start: scale(event.start), end: scale(event.end) })
}

export function withTiming(event: SubtitleEvent, start: Time, end: Time): SubtitleEvent {
	return createEvent({ ...event, start, end })
}

/**
 * Replace the text, decoding the given native line-break encoding
 */
export function withText(
	event: SubtitleEvent,
	text: string,
	encoding: LineBreakEncoding = 'newline'
): SubtitleEvent {
	return createEvent({ ...event, text: normalizeLineBreaks(text, encoding) })
}

export function withStyle(event: SubtitleEvent, style: string): SubtitleEvent {
	return createEvent({ ...event, style })
}

/**
 * Convert a native line-break encoding to "\n"
 */
export function normalizeLineBreaks(text: string, encoding: LineBreakEncoding = 'newline'): string {
	const normalized = text.replace(/\r\n?/g, '\n')
	switch (encoding) {
		case 'ass':
			return normalized.replace(/\\N/g, '\n')
		case 'pipe':
			return normalized.replace(/\|/g, '\n')
		case 'newline':
			return normalized
	}
}

/**
 * Convert "\n" to a native line-break encoding
 */
export function encodeLineBreaks(text: string, encoding: LineBreakEncoding): string {
	switch (encoding) {
		case 'ass':
			return text.replace(/\n/g, '\\N')
		case 'pipe':
			return text.replace(/\n/g, '|')
		case 'newline':
			return text
	}
}

export function isComment(event: SubtitleEvent): boolean {
	return event.type === 'Comment'
}

/**
 * True when the event draws vector shapes (\p1 and up) instead of text
 */
export function isDrawing(event: SubtitleEvent): boolean {
	if (!event.text.includes('{')) return false
	return styledFragments(event.text, DEFAULT_STYLE, undefined, { lenient: true }).some(
		fragment => fragment.drawing && fragment.text.trim() !== ''
	)
}

/**
 * Text without override tags; \h becomes a space and soft \n a line break
 */
export function plainText(event: SubtitleEvent | string): string {
	const text = typeof event === 'string' ? event : event.text
	let plain = ''
	for (const run of scanTags(text, { lenient: true })) plain += run.text
	return unescapeText(plain)
}

/**
 * Decode the \h and soft \n escapes of a plain run
 */
export function unescapeText(text: string): string {
	return text.replace(/\\h/g, ' ').replace(/\\n/g, '\n')
}

/**
 * Order by start, then end
 */
export function compareEvents(a: SubtitleEvent, b: SubtitleEvent): number {
	return a.start - b.start || a.end - b.end
}

/**
 * Field-wise equality
 */
export function eventsEqual(a: SubtitleEvent, b: SubtitleEvent): boolean {
	return (
		a.start === b.start &&
		a.end === b.end &&
		a.text === b.text &&
		a.style === b.style &&
		a.layer === b.layer &&
		a.name === b.name &&
		a.marginL === b.marginL &&
		a.marginR === b.marginR &&
		a.marginV === b.marginV &&
		a.effect === b.effect &&
		a.type === b.type &&
		a.marked === b.marked &&
		a.language === b.language
	)
}
