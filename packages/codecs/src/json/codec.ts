/**
 * JSON codec implementation
 */

import type { ReadOptions, ReadResult, SubtitleCodec, SubtitleDocument, WriteOptions, WriteResult } from '@subforge/core'
import { decodeJson, isJson } from './decoder'
import { encodeJson } from './encoder'

export class JsonCodec implements SubtitleCodec {
	readonly name = 'JSON'
	readonly format = 'json'
	readonly extensions = ['.json']
	readonly mimeTypes = ['application/json']

	canDecode(text: string): boolean {
		return isJson(text)
	}

	read(text: string, options?: ReadOptions): ReadResult {
		return decodeJson(text, options)
	}

	write(document: SubtitleDocument, options?: WriteOptions): WriteResult {
		return encodeJson(document, options)
	}
}
