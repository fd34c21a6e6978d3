/**
 * Subtitle error taxonomy
 * Fatal conditions are thrown; recoverable ones are returned as warnings
 */

export type SubtitleErrorCode =
	| 'MALFORMED_TIMESTAMP'
	| 'MISSING_FRAME_RATE'
	| 'MALFORMED_INPUT'
	| 'UNTERMINATED_OVERRIDE_BLOCK'
	| 'INVALID_TIMING'
	| 'DUPLICATE_STYLE'
	| 'MISSING_STYLE'
	| 'UNKNOWN_FORMAT'
	| 'UNKNOWN_FILE_EXTENSION'
	| 'FORMAT_AUTODETECTION'

/**
 * Base class for every error thrown by subforge
 */
export class SubtitleError extends Error {
	readonly code: SubtitleErrorCode

	constructor(code: SubtitleErrorCode, message: string) {
		super(message)
		this.name = new.target.name
		this.code = code
	}
}

export class MalformedTimestampError extends SubtitleError {
	readonly text: string

	constructor(text: string, format: string, reason?: string) {
		super('MALFORMED_TIMESTAMP', `Malformed ${format} timestamp ${JSON.stringify(text)}${reason ? `: ${reason}` : ''}`)
		this.text = text
	}
}

export class MissingFrameRateError extends SubtitleError {
	constructor(context: string) {
		super('MISSING_FRAME_RATE', `${context} requires a frame rate`)
	}
}

/**
 * Structurally invalid record in a subtitle file
 */
export class MalformedInputError extends SubtitleError {
	/** 1-based line number of the offending record */
	readonly line: number

	constructor(line: number, message: string) {
		super('MALFORMED_INPUT', `Line ${line}: ${message}`)
		this.line = line
	}
}

export class UnterminatedOverrideBlockError extends SubtitleError {
	/** Offset of the orphan "{" in the event text */
	readonly position: number

	constructor(position: number) {
		super('UNTERMINATED_OVERRIDE_BLOCK', `Override block opened at ${position} is never closed`)
		this.position = position
	}
}

export class InvalidTimingError extends SubtitleError {
	constructor(message: string) {
		super('INVALID_TIMING', message)
	}
}

export class DuplicateStyleError extends SubtitleError {
	readonly style: string

	constructor(style: string) {
		super('DUPLICATE_STYLE', `Style ${JSON.stringify(style)} already exists`)
		this.style = style
	}
}

export class MissingStyleError extends SubtitleError {
	readonly style: string

	constructor(style: string, message?: string) {
		super('MISSING_STYLE', message ?? `Style ${JSON.stringify(style)} does not exist`)
		this.style = style
	}
}

export class UnknownFormatError extends SubtitleError {
	constructor(format: string) {
		super('UNKNOWN_FORMAT', `Unknown subtitle format: ${format}`)
	}
}

export class UnknownFileExtensionError extends SubtitleError {
	constructor(extension: string) {
		super('UNKNOWN_FILE_EXTENSION', `No subtitle format for extension ${JSON.stringify(extension)}`)
	}
}

export class FormatAutodetectionError extends SubtitleError {
	readonly candidates: readonly string[]

	constructor(candidates: readonly string[]) {
		super(
			'FORMAT_AUTODETECTION',
			candidates.length === 0
				? 'No suitable subtitle format'
				: `Multiple suitable subtitle formats (${candidates.join(', ')})`
		)
		this.candidates = candidates
	}
}
