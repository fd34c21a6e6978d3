/**
 * Subtitle document
 * Ordered events, named styles and script metadata
 */

import { DuplicateStyleError, InvalidTimingError, MissingStyleError } from './errors'
import {
	compareEvents,
	createEvent,
	eventsEqual,
	isComment,
	isDrawing,
	plainText,
	scaleEvent,
	shiftEvent,
	withStyle,
	type EventInit,
	type SubtitleEvent,
} from './event'
import { cloneStyle, createStyle, DEFAULT_STYLE_NAME, stylesEqual, type Style } from './style'
import type { SubtitleFormat, Time } from './types'

/**
 * Outcome of looking up an event's style reference
 */
export interface ResolvedStyle {
	name: string
	style: Style
	/** false when the reference was dangling and "Default" was used */
	resolved: boolean
}

/**
 * Opaque section kept for write-back ([Fonts], [Graphics], WebVTT STYLE/REGION...)
 */
export interface ExtraSection {
	/** Grammar the section belongs to */
	format: 'ass' | 'vtt'
	name: string
	lines: string[]
}

export class SubtitleDocument {
	private eventList: SubtitleEvent[] = []
	private styleMap = new Map<string, Style>([[DEFAULT_STYLE_NAME, createStyle()]])

	/** Script metadata (Title, PlayResX, ...), in file order */
	readonly info = new Map<string, string>()
	/** Sections a reader does not interpret */
	readonly extraSections: ExtraSection[] = []
	/** Frame rate declared by or used for a frame-based source */
	fps?: number
	/** Format the document was read from */
	format?: SubtitleFormat

	constructor(events: Iterable<SubtitleEvent | EventInit> = []) {
		for (const event of events) this.addEvent(event)
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Events
	// ─────────────────────────────────────────────────────────────────────────

	get events(): readonly SubtitleEvent[] {
		return this.eventList
	}

	get length(): number {
		return this.eventList.length
	}

	addEvent(event: SubtitleEvent | EventInit): SubtitleEvent {
		const created = createEvent(event)
		this.eventList.push(created)
		return created
	}

	insertEvent(index: number, event: SubtitleEvent | EventInit): SubtitleEvent {
		const created = createEvent(event)
		this.eventList.splice(this.checkIndex(index, true), 0, created)
		return created
	}

	replaceEvent(index: number, event: SubtitleEvent | EventInit): SubtitleEvent {
		const created = createEvent(event)
		this.eventList[this.checkIndex(index)] = created
		return created
	}

	removeEvent(index: number): SubtitleEvent {
		const [removed] = this.eventList.splice(this.checkIndex(index), 1)
		if (!removed) throw new RangeError(`No event at index ${index}`)
		return removed
	}

	setEvents(events: Iterable<SubtitleEvent | EventInit>): void {
		this.eventList = Array.from(events, createEvent)
	}

	private checkIndex(index: number, allowEnd = false): number {
		const max = allowEnd ? this.eventList.length : this.eventList.length - 1
		if (!Number.isInteger(index) || index < 0 || index > max) {
			throw new RangeError(`Event index ${index} out of range`)
		}
		return index
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Styles
	// ─────────────────────────────────────────────────────────────────────────

	get styles(): ReadonlyMap<string, Style> {
		return this.styleMap
	}

	hasStyle(name: string): boolean {
		return this.styleMap.has(name)
	}

	getStyle(name: string): Style | undefined {
		return this.styleMap.get(name)
	}

	/**
	 * Add a new style; fails when the name is taken
	 */
	addStyle(name: string, style: Style = createStyle()): void {
		if (this.styleMap.has(name)) throw new DuplicateStyleError(name)
		this.styleMap.set(name, style)
	}

	/**
	 * Add or replace a style; events keep referring to it by name
	 */
	setStyle(name: string, style: Style): void {
		this.styleMap.set(name, style)
	}

	removeStyle(name: string): Style {
		if (name === DEFAULT_STYLE_NAME) {
			throw new MissingStyleError(name, 'The Default style cannot be removed')
		}
		const style = this.styleMap.get(name)
		if (!style) throw new MissingStyleError(name)
		this.styleMap.delete(name)
		return style
	}

	/**
	 * Rename a style in place (keeping its position) and retarget its events
	 */
	renameStyle(oldName: string, newName: string): void {
		const style = this.styleMap.get(oldName)
		if (!style) throw new MissingStyleError(oldName)
		if (oldName === newName) return
		if (oldName === DEFAULT_STYLE_NAME) {
			throw new MissingStyleError(oldName, 'The Default style cannot be renamed')
		}
		if (this.styleMap.has(newName)) throw new DuplicateStyleError(newName)

		this.styleMap = new Map(
			[...this.styleMap].map(([name, value]) => [name === oldName ? newName : name, value])
		)
		this.eventList = this.eventList.map(event =>
			event.style === oldName ? withStyle(event, newName) : event
		)
	}

	/**
	 * Put the named styles first, in the given order; the rest keep theirs
	 */
	orderStyles(names: Iterable<string>): void {
		const ordered = new Map<string, Style>()
		for (const name of names) {
			const style = this.styleMap.get(name)
			if (style) ordered.set(name, style)
		}
		for (const [name, style] of this.styleMap) {
			if (!ordered.has(name)) ordered.set(name, style)
		}
		this.styleMap = ordered
	}

	/**
	 * Copy styles from another document
	 */
	importStyles(other: SubtitleDocument, overwrite = true): void {
		for (const [name, style] of other.styles) {
			if (overwrite || !this.styleMap.has(name)) {
				this.styleMap.set(name, cloneStyle(style))
			}
		}
	}

	/**
	 * Look up a style reference, falling back to "Default"
	 */
	resolveStyle(name: string): ResolvedStyle {
		const style = this.styleMap.get(name)
		if (style) return { name, style, resolved: true }
		return { name: DEFAULT_STYLE_NAME, style: this.defaultStyle, resolved: false }
	}

	private get defaultStyle(): Style {
		let style = this.styleMap.get(DEFAULT_STYLE_NAME)
		if (!style) {
			style = createStyle()
			this.styleMap.set(DEFAULT_STYLE_NAME, style)
		}
		return style
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Metadata
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Declared video resolution (PlayResX/PlayResY)
	 */
	get videoSize(): { width: number; height: number } | undefined {
		const width = parseInt(this.info.get('PlayResX') ?? '', 10)
		const height = parseInt(this.info.get('PlayResY') ?? '', 10)
		return width > 0 && height > 0 ? { width, height } : undefined
	}

	set videoSize(size: { width: number; height: number } | undefined) {
		if (size) {
			this.info.set('PlayResX', String(size.width))
			this.info.set('PlayResY', String(size.height))
		} else {
			this.info.delete('PlayResX')
			this.info.delete('PlayResY')
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Bulk edits
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Shift every event; times clamp at zero
	 */
	shift(delta: number): void {
		this.eventList = this.eventList.map(event => shiftEvent(event, delta))
	}

	/**
	 * Stretch every event's timing around a pivot
	 */
	scale(factor: number, pivot: Time = 0): void {
		this.eventList = this.eventList.map(event => scaleEvent(event, factor, pivot))
	}

	/**
	 * Retime subtitles made for one frame rate to another
	 * e.g. 25 fps PAL subtitles to a 23.976 fps release
	 */
	transformFramerate(inFps: number, outFps: number): void {
		if (!(inFps > 0) || !(outFps > 0)) {
			throw new InvalidTimingError(`Frame rates must be positive, got ${inFps} and ${outFps}`)
		}
		this.scale(inFps / outFps)
	}

	/**
	 * Order events by start, then end (stable)
	 */
	sort(): void {
		this.eventList = [...this.eventList].sort(compareEvents)
	}

	/**
	 * Drop comments, drawings and events without visible text
	 */
	removeMiscellaneousEvents(): void {
		this.eventList = this.eventList.filter(
			event => !isComment(event) && !isDrawing(event) && plainText(event).trim() !== ''
		)
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Copies
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Deep copy; nothing is shared with the original
	 */
	clone(): SubtitleDocument {
		const copy = new SubtitleDocument()
		copy.eventList = [...this.eventList]
		copy.styleMap = new Map([...this.styleMap].map(([name, style]) => [name, cloneStyle(style)]))
		for (const [key, value] of this.info) copy.info.set(key, value)
		for (const section of this.extraSections) {
			copy.extraSections.push({ ...section, lines: [...section.lines] })
		}
		copy.fps = this.fps
		copy.format = this.format
		return copy
	}

	/**
	 * Structural equality of events, styles and metadata
	 */
	equals(other: SubtitleDocument): boolean {
		if (this.eventList.length !== other.eventList.length) return false
		if (!this.eventList.every((event, i) => eventsEqual(event, other.eventList[i]!))) return false

		if (this.styleMap.size !== other.styleMap.size) return false
		for (const [name, style] of this.styleMap) {
			const otherStyle = other.styleMap.get(name)
			if (!otherStyle || !stylesEqual(style, otherStyle)) return false
		}

		if (this.info.size !== other.info.size) return false
		for (const [key, value] of this.info) {
			if (other.info.get(key) !== value) return false
		}
		return true
	}

	/**
	 * Concatenate documents
	 *
	 * Styles are deduplicated by attributes: a style equal to one already
	 * merged under the same name is shared, a different one is renamed
	 * "Name (2)", "Name (3)"... and its events follow.
	 */
	static merge(...documents: SubtitleDocument[]): SubtitleDocument {
		const merged = new SubtitleDocument()
		let first = true

		for (const document of documents) {
			const renames = new Map<string, string>()

			for (const [name, style] of document.styles) {
				const existing = merged.styleMap.get(name)
				if (!existing || (first && name === DEFAULT_STYLE_NAME)) {
					merged.styleMap.set(name, cloneStyle(style))
					continue
				}
				if (stylesEqual(existing, style)) continue

				let n = 2
				while (merged.styleMap.has(`${name} (${n})`)) n++
				const renamed = `${name} (${n})`
				merged.styleMap.set(renamed, cloneStyle(style))
				renames.set(name, renamed)
			}

			for (const event of document.events) {
				const target = renames.get(event.style)
				merged.eventList.push(target ? withStyle(event, target) : event)
			}
			for (const [key, value] of document.info) {
				if (!merged.info.has(key)) merged.info.set(key, value)
			}
			for (const section of document.extraSections) {
				merged.extraSections.push({ ...section, lines: [...section.lines] })
			}
			merged.fps ??= document.fps
			first = false
		}

		return merged
	}
}
