/**
 * ASS/SSA codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeAss, detectAssFormat, isAss } from './decoder'
import { encodeAss } from './encoder'
import type { SubStationVariant } from './types'

/**
 * One codec per dialect; each claims only scripts of its own ScriptType
 */
export class AssCodec implements SubtitleCodec {
	readonly name: string
	readonly extensions: readonly string[]
	readonly mimeTypes: readonly string[]

	constructor(readonly format: SubStationVariant = 'ass') {
		this.name = format === 'ass' ? 'Advanced SubStation Alpha' : 'SubStation Alpha'
		this.extensions = [`.${format}`]
		this.mimeTypes = [format === 'ass' ? 'text/x-ass' : 'text/x-ssa']
	}

	canDecode(text: string): boolean {
		return isAss(text) && detectAssFormat(text) === this.format
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeAss(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeAss(document, { ...options, variant: options?.variant ?? this.format })
	}
}
