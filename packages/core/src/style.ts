/**
 * Subtitle styles
 * A style is a named bundle of formatting attributes shared by events
 */

import { colorsEqual, createColor, type Color } from './color'

export interface Style {
	fontName: string
	fontSize: number
	bold: boolean
	italic: boolean
	underline: boolean
	strikeout: boolean
	primaryColor: Color
	secondaryColor: Color
	/** Border color (TertiaryColour in SSA) */
	outlineColor: Color
	/** Shadow color */
	backColor: Color
	outline: number
	shadow: number
	/** Numpad alignment (1-9) */
	alignment: number
	marginL: number
	marginR: number
	marginV: number
	scaleX: number
	scaleY: number
	spacing: number
	/** Rotation in degrees */
	angle: number
	borderStyle: number
	encoding: number
}

/**
 * Numpad alignment values
 * 7 8 9  (top)
 * 4 5 6  (middle)
 * 1 2 3  (bottom)
 */
export const Alignment = {
	BOTTOM_LEFT: 1,
	BOTTOM_CENTER: 2,
	BOTTOM_RIGHT: 3,
	MIDDLE_LEFT: 4,
	MIDDLE_CENTER: 5,
	MIDDLE_RIGHT: 6,
	TOP_LEFT: 7,
	TOP_CENTER: 8,
	TOP_RIGHT: 9,
} as const

export const DEFAULT_STYLE_NAME = 'Default'

export const DEFAULT_STYLE: Readonly<Style> = Object.freeze({
	fontName: 'Arial',
	fontSize: 20,
	bold: false,
	italic: false,
	underline: false,
	strikeout: false,
	primaryColor: createColor(255, 255, 255),
	secondaryColor: createColor(255, 0, 0),
	outlineColor: createColor(0, 0, 0),
	backColor: createColor(0, 0, 0),
	outline: 2,
	shadow: 2,
	alignment: Alignment.BOTTOM_CENTER,
	marginL: 10,
	marginR: 10,
	marginV: 10,
	scaleX: 100,
	scaleY: 100,
	spacing: 0,
	angle: 0,
	borderStyle: 1,
	encoding: 1,
})

export const STYLE_KEYS: readonly (keyof Style)[] = [
	'fontName',
	'fontSize',
	'bold',
	'italic',
	'underline',
	'strikeout',
	'primaryColor',
	'secondaryColor',
	'outlineColor',
	'backColor',
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
]

/**
 * Create a style, filling unspecified attributes with defaults
 */
export function createStyle(attributes: Partial<Style> = {}): Style {
	return resolveEffectiveStyle(DEFAULT_STYLE, attributes)
}

export function cloneStyle(style: Style): Style {
	return { ...style }
}

/**
 * Merge local overrides onto a base style, returning a new style
 */
export function resolveEffectiveStyle(base: Style, overrides: Partial<Style>): Style {
	const effective = { ...base }
	for (const key of STYLE_KEYS) {
		const value = overrides[key]
		if (value !== undefined) setAttribute(effective, key, value)
	}
	return effective
}

function setAttribute<K extends keyof Style>(style: Style, key: K, value: Style[K]): void {
	style[key] = value
}

/**
 * Attribute-wise equality
 */
export function stylesEqual(a: Style, b: Style): boolean {
	return styleDifferences(a, b).length === 0
}

/**
 * Attributes of `style` that differ from `reference`
 */
export function styleDifferences(style: Style, reference: Style = DEFAULT_STYLE): (keyof Style)[] {
	return STYLE_KEYS.filter(key => {
		const a = style[key]
		const b = reference[key]
		if (typeof a === 'object' && typeof b === 'object') return !colorsEqual(a, b)
		return a !== b
	})
}

// SSA v4 alignment: 1-3 bottom, 5-7 top (+4), 9-11 middle (+8)
const SSA_TO_ASS: Record<number, number> = { 1: 1, 2: 2, 3: 3, 5: 7, 6: 8, 7: 9, 9: 4, 10: 5, 11: 6 }
const ASS_TO_SSA: Record<number, number> = { 1: 1, 2: 2, 3: 3, 4: 9, 5: 10, 6: 11, 7: 5, 8: 6, 9: 7 }

export function ssaToAssAlignment(alignment: number): number {
	return SSA_TO_ASS[alignment] ?? Alignment.BOTTOM_CENTER
}

export function assToSsaAlignment(alignment: number): number {
	return ASS_TO_SSA[alignment] ?? 2
}
