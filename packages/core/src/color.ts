/**
 * SubStation colors
 * Stored as RGBA where alpha follows SubStation: 0 is opaque, 255 transparent
 */

export interface Color {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}

export function createColor(r: number, g: number, b: number, a: number = 0): Color {
	return { r: r & 0xff, g: g & 0xff, b: b & 0xff, a: a & 0xff }
}

/**
 * Parse a color in any SubStation notation
 * - &HAABBGGRR / &HBBGGRR / &HBBGGRR& (ASS)
 * - decimal integer (SSA v4)
 */
export function parseAssColor(text: string): Color | null {
	const value = text.trim()

	const hex = value.match(/^&?H([0-9a-fA-F]{1,8})&?$/i)
	if (hex) {
		const digits = hex[1]!
		const n = parseInt(digits, 16)
		return {
			r: n & 0xff,
			g: (n >>> 8) & 0xff,
			b: (n >>> 16) & 0xff,
			a: digits.length > 6 ? (n >>> 24) & 0xff : 0,
		}
	}

	if (/^-?\d+$/.test(value)) {
		// SSA stores AABBGGRR as a (possibly signed) 32-bit decimal
		const n = parseInt(value, 10) >>> 0
		return {
			r: n & 0xff,
			g: (n >>> 8) & 0xff,
			b: (n >>> 16) & 0xff,
			a: (n >>> 24) & 0xff,
		}
	}

	return null
}

/**
 * Style-line notation (&HAABBGGRR)
 */
export function formatAssColor(color: Color): string {
	return `&H${hex2(color.a)}${hex2(color.b)}${hex2(color.g)}${hex2(color.r)}`
}

/**
 * Override-tag notation (&HBBGGRR&), alpha is carried by \alpha tags
 */
export function formatTagColor(color: Color): string {
	return `&H${hex2(color.b)}${hex2(color.g)}${hex2(color.r)}&`
}

/**
 * SSA v4 notation (decimal)
 */
export function formatSsaColor(color: Color): string {
	return String(((color.a << 24) | (color.b << 16) | (color.g << 8) | color.r) >>> 0)
}

/**
 * CSS-style #RRGGBB
 */
export function colorToHex(color: Color): string {
	return `#${hex2(color.r)}${hex2(color.g)}${hex2(color.b)}`
}

export function colorsEqual(a: Color, b: Color): boolean {
	return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a
}

function hex2(value: number): string {
	return (value & 0xff).toString(16).toUpperCase().padStart(2, '0')
}
