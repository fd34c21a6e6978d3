/**
 * WebVTT decoder
 */

import { SubtitleDocument, parseTime, type ReadOptions, type ReadResult } from '@subforge/core'
import { markupToTags } from '../common/markup'
import { ParseContext, splitBlocks, splitLines, type SourceLine } from '../common/parse'

const HEADER = /^WEBVTT(?:[ \t](.*))?$/
const TIMING = /^\s*(\S+)\s*-->\s*(\S+)/
const VOICE = /<v(?:\.[^\s>]*)?\s+([^>]*)>/
const VOICE_TAGS = /<\/?v(?:[.\s][^>]*)?>/g

/**
 * Check if text is WebVTT
 */
export function isVtt(text: string): boolean {
	return text.trimStart().startsWith('WEBVTT')
}

/**
 * Decode WebVTT text
 *
 * NOTE blocks are skipped, STYLE and REGION blocks are kept as opaque
 * sections, cue identifiers and settings are not kept. The first voice
 * span names the speaker.
 */
export function decodeVtt(text: string, options: ReadOptions = {}): ReadResult {
	const context = new ParseContext(options)
	const document = new SubtitleDocument()
	document.format = 'vtt'

	const blocks = splitBlocks(splitLines(text))
	const header = blocks[0]?.[0]?.text.trim().match(HEADER)

	if (header) {
		const title = header[1]?.trim()
		if (title) document.info.set('Title', title)
		// header block also holds metadata lines
		blocks.shift()
	} else {
		context.fail(1, 'Missing WEBVTT header')
	}

	for (const block of blocks) {
		const head = block[0]!.text.trim()

		if (head === 'NOTE' || head.startsWith('NOTE ') || head.startsWith('NOTE\t')) continue

		if (head === 'STYLE' || head === 'REGION') {
			document.extraSections.push({ format: 'vtt', name: head, lines: block.slice(1).map(line => line.text) })
			continue
		}

		decodeCue(block, document, context)
	}

	return { document, warnings: context.warnings }
}

function decodeCue(block: SourceLine[], document: SubtitleDocument, context: ParseContext): void {
	// first line is a cue identifier unless it holds the timing
	const timingIndex = block[0]!.text.includes('-->') ? 0 : 1
	const timing = block[timingIndex]

	if (!timing || !timing.text.includes('-->')) {
		context.fail((timing ?? block[0]!).number, 'Expected a cue timing line')
		return
	}

	const match = timing.text.match(TIMING)
	if (!match) {
		context.fail(timing.number, 'Malformed cue timing line')
		return
	}

	const payload = block
		.slice(timingIndex + 1)
		.map(line => line.text)
		.join('\n')
	const name = payload.match(VOICE)?.[1]?.trim() ?? ''
	const text = markupToTags(payload.replace(VOICE_TAGS, ''), context.options).trim()

	context.attempt(timing.number, () =>
		document.addEvent(
			context.withLanguage({
				start: parseTime(match[1]!, 'vtt'),
				end: parseTime(match[2]!, 'vtt'),
				text,
				name,
			})
		)
	)
}
