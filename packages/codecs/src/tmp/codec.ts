/**
 * TMP codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeTmp, isTmp } from './decoder'
import { encodeTmp } from './encoder'

export class TmpCodec implements SubtitleCodec {
	readonly name = 'TMP'
	readonly format = 'tmp'
	readonly extensions = ['.txt']
	readonly mimeTypes = ['text/plain']

	canDecode(text: string): boolean {
		return isTmp(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeTmp(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeTmp(document, options)
	}
}
