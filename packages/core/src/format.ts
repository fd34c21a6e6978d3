import { UnknownFileExtensionError, UnknownFormatError } from './errors'
import type { SubtitleFormat, TimeFormat } from './types'

/**
 * Format identifiers in registry order
 */
export const FORMAT_IDENTIFIERS: readonly SubtitleFormat[] = [
	'srt',
	'ass',
	'ssa',
	'microdvd',
	'json',
	'mpl2',
	'tmp',
	'vtt',
]

/**
 * File extension -> format
 * ".txt" is ambiguous (TMP and MPL2 both use it) and maps to TMP
 */
const EXTENSION_TO_FORMAT: Record<string, SubtitleFormat> = {
	'.srt': 'srt',
	'.ass': 'ass',
	'.ssa': 'ssa',
	'.sub': 'microdvd',
	'.json': 'json',
	'.txt': 'tmp',
	'.vtt': 'vtt',
}

const MIME_TYPES: Record<SubtitleFormat, string> = {
	srt: 'application/x-subrip',
	ass: 'text/x-ass',
	ssa: 'text/x-ssa',
	microdvd: 'text/x-microdvd',
	json: 'application/json',
	mpl2: 'text/x-mpl2',
	tmp: 'text/plain',
	vtt: 'text/vtt',
}

/**
 * Check if a string is a known format identifier
 */
export function isSubtitleFormat(value: string): value is SubtitleFormat {
	return FORMAT_IDENTIFIERS.some(format => format === value)
}

export function assertSubtitleFormat(value: string): SubtitleFormat {
	if (!isSubtitleFormat(value)) throw new UnknownFormatError(value)
	return value
}

/**
 * Get format from file extension (with or without the dot)
 */
export function getFormatFromExtension(extension: string): SubtitleFormat {
	const ext = (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase()
	const format = EXTENSION_TO_FORMAT[ext]
	if (!format) throw new UnknownFileExtensionError(extension)
	return format
}

/**
 * Get file extension for format
 */
export function getExtension(format: SubtitleFormat): string {
	if (format === 'mpl2') return '.txt'
	for (const [ext, f] of Object.entries(EXTENSION_TO_FORMAT)) {
		if (f === format) return ext
	}
	throw new UnknownFormatError(format)
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: SubtitleFormat): string {
	return MIME_TYPES[format]
}

/**
 * Timestamp grammar used by a format
 */
export function getTimeFormat(format: SubtitleFormat): TimeFormat | null {
	switch (format) {
		case 'ass':
		case 'ssa':
			return 'ass'
		case 'json':
			return null
		default:
			return format
	}
}
