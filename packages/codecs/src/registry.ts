/**
 * Codec registry: format lookup, detection and one-call read/write/convert
 */

import {
	FORMAT_IDENTIFIERS,
	FormatAutodetectionError,
	assertSubtitleFormat,
	type EncodingDetector,
	type ReadOptions,
	type ReadResult,
	type SubtitleCodec,
	type SubtitleDocument,
	type SubtitleFormat,
	type WriteOptions,
	type WriteResult,
} from '@subforge/core'
import { AssCodec } from './ass'
import { JsonCodec } from './json'
import { MicroDvdCodec } from './microdvd'
import { Mpl2Codec } from './mpl2'
import { SrtCodec } from './srt'
import { TmpCodec } from './tmp'
import { VttCodec } from './vtt'

/**
 * Registry of available codecs
 */
export const CODECS: Readonly<Record<SubtitleFormat, SubtitleCodec>> = {
	srt: new SrtCodec(),
	ass: new AssCodec('ass'),
	ssa: new AssCodec('ssa'),
	microdvd: new MicroDvdCodec(),
	json: new JsonCodec(),
	mpl2: new Mpl2Codec(),
	tmp: new TmpCodec(),
	vtt: new VttCodec(),
}

/**
 * Codec for a format identifier
 */
export function getCodec(format: string): SubtitleCodec {
	return CODECS[assertSubtitleFormat(format)]
}

function matchingFormats(text: string): SubtitleFormat[] {
	return FORMAT_IDENTIFIERS.filter(format => CODECS[format].canDecode(text))
}

/**
 * Detect subtitle format from content
 * @returns the only matching format, or null when none or several match
 */
export function detectSubtitleFormat(text: string): SubtitleFormat | null {
	const formats = matchingFormats(text)
	return formats.length === 1 ? formats[0]! : null
}

/**
 * Like detectSubtitleFormat, but failing with the candidates
 */
export function autodetectFormat(text: string): SubtitleFormat {
	const formats = matchingFormats(text)
	if (formats.length !== 1) throw new FormatAutodetectionError(formats)
	return formats[0]!
}

/**
 * Text of a subtitle file, without byte order mark
 * Bytes go through the encoding detector when one is given, UTF-8 otherwise.
 */
export function decodeText(data: string | Uint8Array, detectEncoding?: EncodingDetector): string {
	const text =
		typeof data === 'string' ? data : detectEncoding ? detectEncoding(data).text : new TextDecoder('utf-8').decode(data)
	return text.startsWith('\uFEFF') ? text.slice(1) : text
}

export interface LoadOptions extends ReadOptions {
	/** Source format, detected from content when absent */
	format?: string
	detectEncoding?: EncodingDetector
}

export interface LoadResult extends ReadResult {
	format: SubtitleFormat
}

/**
 * Read a subtitle file in any supported format
 */
export function readSubtitles(data: string | Uint8Array, options: LoadOptions = {}): LoadResult {
	const text = decodeText(data, options.detectEncoding)
	const format = options.format ? assertSubtitleFormat(options.format) : autodetectFormat(text)
	return { ...CODECS[format].read(text, options), format }
}

/**
 * Write a document in the given format
 */
export function writeSubtitles(document: SubtitleDocument, format: string, options: WriteOptions = {}): WriteResult {
	return getCodec(format).write(document, options)
}

export interface ConvertOptions {
	/** Source format, detected from content when absent */
	from?: string
	to: string
	read?: Omit<LoadOptions, 'format'>
	write?: WriteOptions
}

export interface ConvertResult {
	read: LoadResult
	write: WriteResult
}

/**
 * Read, then write in another format
 */
export function convertSubtitles(data: string | Uint8Array, options: ConvertOptions): ConvertResult {
	const read = readSubtitles(data, { ...options.read, format: options.from })
	const write = writeSubtitles(read.document, options.to, options.write)
	return { read, write }
}
