/**
 * Shared reader plumbing: numbered lines and strict/lenient error handling
 */

import {
	MalformedInputError,
	MissingFrameRateError,
	SubtitleError,
	plainText,
	type EventInit,
	type ParseWarning,
	type ReadOptions,
} from '@subforge/core'

export interface SourceLine {
	text: string
	/** 1-based */
	number: number
}

export function splitLines(text: string): SourceLine[] {
	return text.split(/\r\n|\r|\n/).map((line, i) => ({ text: line, number: i + 1 }))
}

/**
 * Group lines into blocks separated by blank lines
 */
export function splitBlocks(lines: readonly SourceLine[]): SourceLine[][] {
	const blocks: SourceLine[][] = []
	let block: SourceLine[] = []
	for (const line of lines) {
		if (line.text.trim() === '') {
			if (block.length > 0) blocks.push(block)
			block = []
		} else {
			block.push(line)
		}
	}
	if (block.length > 0) blocks.push(block)
	return blocks
}

/**
 * Per-read state shared by a reader's helpers
 */
export class ParseContext {
	readonly warnings: ParseWarning[] = []
	readonly lenient: boolean

	constructor(readonly options: ReadOptions = {}) {
		this.lenient = options.mode === 'lenient'
	}

	/**
	 * Report a malformed record
	 * Strict mode throws; lenient mode records a warning and the caller skips the record
	 */
	fail(line: number, message: string, code: ParseWarning['code'] = 'MALFORMED_INPUT'): void {
		if (!this.lenient) throw new MalformedInputError(line, message)
		this.warnings.push({ code, line, message: `Line ${line}: ${message}` })
	}

	/**
	 * Run the parser of one record; model errors (bad timestamps, end before
	 * start...) become malformed input at `line`
	 */
	attempt<T>(line: number, parse: () => T): T | undefined {
		try {
			return parse()
		} catch (error) {
			if (!(error instanceof SubtitleError) || error instanceof MissingFrameRateError) throw error
			this.fail(line, error.message, error.code === 'MALFORMED_TIMESTAMP' ? 'MALFORMED_TIMESTAMP' : 'MALFORMED_INPUT')
			return undefined
		}
	}

	/**
	 * Attach a language tag when a detector was given
	 */
	withLanguage(init: EventInit): EventInit {
		const detect = this.options.detectLanguage
		if (!detect) return init
		const language = detect(plainText(init.text))
		return language === undefined ? init : { ...init, language }
	}
}
