/**
 * MicroDVD codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeMicroDvd, isMicroDvd } from './decoder'
import { encodeMicroDvd } from './encoder'

export class MicroDvdCodec implements SubtitleCodec {
	readonly name = 'MicroDVD'
	readonly format = 'microdvd'
	readonly extensions = ['.sub']
	readonly mimeTypes = ['text/x-microdvd']

	canDecode(text: string): boolean {
		return isMicroDvd(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeMicroDvd(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeMicroDvd(document, options)
	}
}
