import type { SubtitleDocument } from './document'

/**
 * Supported subtitle formats
 */
export type SubtitleFormat = 'ass' | 'ssa' | 'srt' | 'vtt' | 'microdvd' | 'mpl2' | 'tmp' | 'json'

/**
 * Timestamp grammars (one per timed text format)
 */
export type TimeFormat = 'ass' | 'srt' | 'vtt' | 'microdvd' | 'mpl2' | 'tmp'

/**
 * Time in integer milliseconds, never negative
 */
export type Time = number

/**
 * Parse strictness
 * - strict: first malformed record throws
 * - lenient: malformed records are skipped and reported
 */
export type ParseMode = 'strict' | 'lenient'

/**
 * Encoding detection collaborator
 */
export type EncodingDetector = (data: Uint8Array) => { encoding: string; text: string }

/**
 * Language detection collaborator, returns a language tag such as "en"
 */
export type LanguageDetector = (text: string) => string | undefined

/**
 * HTML stripping collaborator
 */
export type HtmlStripper = (text: string) => string

/**
 * Read options
 */
export interface ReadOptions {
	mode?: ParseMode
	/** Frame rate for frame-based formats (MicroDVD), overrides a declared one */
	fps?: number
	/** Keep HTML-like markup verbatim instead of converting it to override tags */
	keepHtmlTags?: boolean
	/** Convert known markup but keep unknown tags instead of stripping them */
	keepUnknownHtml?: boolean
	stripHtml?: HtmlStripper
	detectLanguage?: LanguageDetector
}

/**
 * Write options
 */
export interface WriteOptions {
	/** Frame rate for frame-based formats, defaults to the document's */
	fps?: number
	/** Line ending of the output file */
	lineBreak?: 'lf' | 'crlf'
	/** SRT millisecond separator */
	msSeparator?: ',' | '.'
	/** WebVTT timestamps: always with hours, or without hours below one hour */
	vttTimestamp?: 'long' | 'short'
	/** SubStation dialect */
	variant?: 'ass' | 'ssa'
	/** SRT/WebVTT: write emphasis markup (from styles and override tags) */
	applyStyles?: boolean
	/** SRT: pass override tags through verbatim */
	keepSsaTags?: boolean
	/** MicroDVD: write the "{1}{1}fps" declaration line */
	writeFpsDeclaration?: boolean
}

/**
 * Recoverable problem found while parsing (lenient mode)
 */
export interface ParseWarning {
	code: 'MALFORMED_INPUT' | 'MALFORMED_TIMESTAMP' | 'DUPLICATE_STYLE' | 'UNTERMINATED_OVERRIDE_BLOCK'
	line: number
	message: string
}

/**
 * Recoverable problem found while writing
 */
export interface WriteWarning {
	code: 'UNRESOLVED_STYLE_REFERENCE'
	eventIndex: number
	style: string
	message: string
}

/**
 * Features a target format may be unable to express
 */
export type Feature =
	| 'emphasis'
	| 'color'
	| 'position'
	| 'font'
	| 'unknownTag'
	| 'drawing'
	| 'comment'
	| 'eventFields'
	| 'styleAttributes'
	| 'timePrecision'
	| 'timeOverflow'

/**
 * What happens to a feature the target cannot express exactly
 */
export type PolicyAction = 'keep' | 'drop' | 'approximate' | 'reject'

/**
 * One applied lossy mapping
 */
export interface ConversionNote {
	feature: Feature
	action: Exclude<PolicyAction, 'keep'>
	eventIndex?: number
	style?: string
	detail: string
}

export interface ReadResult {
	document: SubtitleDocument
	warnings: ParseWarning[]
}

export interface WriteResult {
	text: string
	/** Number of lossy mappings applied */
	lossyCount: number
	notes: ConversionNote[]
	warnings: WriteWarning[]
}

/**
 * Codec interface for reading/writing one subtitle format
 */
export interface SubtitleCodec {
	readonly name: string
	readonly format: SubtitleFormat
	readonly extensions: readonly string[]
	readonly mimeTypes: readonly string[]
	canDecode(text: string): boolean
	read(text: string, options?: ReadOptions): ReadResult
	write(document: SubtitleDocument, options?: WriteOptions): WriteResult
}
