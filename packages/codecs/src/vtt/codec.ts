/**
 * WebVTT codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeVtt, isVtt } from './decoder'
import { encodeVtt } from './encoder'

export class VttCodec implements SubtitleCodec {
	readonly name = 'WebVTT'
	readonly format = 'vtt'
	readonly extensions = ['.vtt']
	readonly mimeTypes = ['text/vtt']

	canDecode(text: string): boolean {
		return isVtt(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeVtt(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeVtt(document, options)
	}
}
