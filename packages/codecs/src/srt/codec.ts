/**
 * SubRip codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeSrt, isSrt } from './decoder'
import { encodeSrt } from './encoder'

export class SrtCodec implements SubtitleCodec {
	readonly name = 'SubRip'
	readonly format = 'srt'
	readonly extensions = ['.srt']
	readonly mimeTypes = ['application/x-subrip']

	canDecode(text: string): boolean {
		return isSrt(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeSrt(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeSrt(document, options)
	}
}
