/**
 * Conversion policy
 *
 * For every target format and document feature, the action taken when the
 * target cannot express what the document uses. `keep` means the target can
 * always express it. Encoders record a note only when a feature is actually
 * lost, so a document using target-representable features reports nothing.
 */

import type {
	ConversionNote,
	Feature,
	PolicyAction,
	SubtitleFormat,
	WriteResult,
	WriteWarning,
} from '@subforge/core'

export type FeaturePolicy = Readonly<Record<Feature, PolicyAction>>

const SUBSTATION: FeaturePolicy = {
	emphasis: 'keep',
	color: 'keep',
	position: 'keep',
	font: 'keep',
	unknownTag: 'keep',
	drawing: 'keep',
	comment: 'keep',
	eventFields: 'keep',
	styleAttributes: 'keep',
	timePrecision: 'approximate',
	timeOverflow: 'keep',
}

const PLAIN: FeaturePolicy = {
	emphasis: 'drop',
	color: 'drop',
	position: 'drop',
	font: 'drop',
	unknownTag: 'drop',
	drawing: 'reject',
	comment: 'drop',
	eventFields: 'drop',
	styleAttributes: 'drop',
	timePrecision: 'approximate',
	timeOverflow: 'keep',
}

export const POLICY: Readonly<Record<SubtitleFormat, FeaturePolicy>> = {
	ass: SUBSTATION,
	// no Layer field, no Underline, StrikeOut, ScaleX/Y, Spacing or Angle style fields
	ssa: { ...SUBSTATION, eventFields: 'drop', styleAttributes: 'drop' },
	srt: { ...PLAIN, timePrecision: 'keep', timeOverflow: 'approximate' },
	vtt: { ...PLAIN, timePrecision: 'keep' },
	// whole-line emphasis and color only
	microdvd: { ...PLAIN, emphasis: 'approximate', color: 'approximate' },
	mpl2: { ...PLAIN, emphasis: 'approximate' },
	tmp: PLAIN,
	json: {
		...SUBSTATION,
		timePrecision: 'keep',
	},
}

/**
 * What a note is about: an event (by document index), a style, or both
 */
export interface NoteSubject {
	eventIndex?: number
	style?: string
}

/**
 * Collects the lossy mappings applied while writing one document
 * At most one note is kept per (event, feature) and per (style, feature)
 */
export class ConversionReport {
	readonly notes: ConversionNote[] = []
	private readonly seen = new Set<string>()

	constructor(readonly target: SubtitleFormat) {}

	record(feature: Feature, subject: NoteSubject, detail: string): void {
		const action = POLICY[this.target][feature]
		if (action === 'keep') return

		const key = `${feature}\u0000${subject.eventIndex ?? ''}\u0000${subject.style ?? ''}`
		if (this.seen.has(key)) return
		this.seen.add(key)

		this.notes.push({ feature, action, ...subject, detail })
	}

	get lossyCount(): number {
		return this.notes.length
	}

	result(text: string, warnings: WriteWarning[] = []): WriteResult {
		return { text, lossyCount: this.lossyCount, notes: [...this.notes], warnings }
	}
}
