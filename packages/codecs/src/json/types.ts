/**
 * JSON interchange layout
 */

import type { EventType, ExtraSection, Style } from '@subforge/core'

export interface JsonStyle extends Style {
	name: string
}

export interface JsonEvent {
	start: number
	end: number
	text: string
	style: string
	layer: number
	name: string
	marginL: number
	marginR: number
	marginV: number
	effect: string
	type: EventType
	marked: boolean
	language?: string
}

export interface JsonDocument {
	info: Record<string, string>
	/** In document order */
	styles: JsonStyle[]
	events: JsonEvent[]
	extraSections: ExtraSection[]
	fps?: number
}

export const STRING_STYLE_KEYS = ['fontName'] as const satisfies readonly (keyof Style)[]

export const BOOLEAN_STYLE_KEYS = ['bold', 'italic', 'underline', 'strikeout'] as const satisfies readonly (keyof Style)[]

export const COLOR_STYLE_KEYS = [
	'primaryColor',
	'secondaryColor',
	'outlineColor',
	'backColor',
] as const satisfies readonly (keyof Style)[]

export const NUMBER_STYLE_KEYS = [
	'fontSize',
	'outline',
	'shadow',
	'alignment',
	'marginL',
	'marginR',
	'marginV',
	'scaleX',
	'scaleY',
	'spacing',
	'angle',
	'borderStyle',
	'encoding',
] as const satisfies readonly (keyof Style)[]

