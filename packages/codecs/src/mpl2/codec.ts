/**
 * MPL2 codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeMpl2, isMpl2 } from './decoder'
import { encodeMpl2 } from './encoder'

export class Mpl2Codec implements SubtitleCodec {
	readonly name = 'MPL2'
	readonly format = 'mpl2'
	readonly extensions = ['.txt']
	readonly mimeTypes = ['text/x-mpl2']

	canDecode(text: string): boolean {
		return isMpl2(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeMpl2(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeMpl2(document, options)
	}
}
