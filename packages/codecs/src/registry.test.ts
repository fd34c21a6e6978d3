import {
	FORMAT_IDENTIFIERS,
	FormatAutodetectionError,
	SubtitleDocument,
	UnknownFormatError,
	type SubtitleFormat,
} from '@subforge/core'
import { describe, expect, it } from 'vitest'
import { encodeAss } from './ass'
import { encodeJson } from './json'
import {
	CODECS,
	autodetectFormat,
	convertSubtitles,
	decodeText,
	detectSubtitleFormat,
	getCodec,
	readSubtitles,
	writeSubtitles,
} from './registry'

const srt = '1\n00:00:01,000 --> 00:00:02,500\nHello\n\n'

function plainDocument(): SubtitleDocument {
	return new SubtitleDocument([
		{ start: 0, end: 1000, text: 'One' },
		{ start: 1000, end: 3000, text: 'Two\nlines' },
		{ start: 3000, end: 8000, text: 'Three' },
	])
}

describe('Codec registry', () => {
	it('should register a codec per format', () => {
		for (const format of FORMAT_IDENTIFIERS) {
			expect(CODECS[format].format).toBe(format)
		}
		expect(getCodec('ssa').extensions).toEqual(['.ssa'])
		expect(() => getCodec('xyz')).toThrow(UnknownFormatError)
	})

	describe('detectSubtitleFormat', () => {
		const document = plainDocument()
		const samples: Record<SubtitleFormat, string> = {
			srt,
			ass: encodeAss(document).text,
			ssa: encodeAss(document, { variant: 'ssa' }).text,
			microdvd: '{1}{1}25\n{0}{25}Hi\n',
			json: encodeJson(document).text,
			mpl2: '[10][20]Hi\n',
			tmp: '00:00:01:Hi\n',
			vtt: 'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHi\n',
		}

		it('should detect every format', () => {
			for (const format of FORMAT_IDENTIFIERS) {
				expect(detectSubtitleFormat(samples[format])).toBe(format)
			}
		})

		it('should give up on unknown content', () => {
			expect(detectSubtitleFormat('hello')).toBeNull()

			try {
				autodetectFormat('hello')
				expect.unreachable()
			} catch (error) {
				expect(error instanceof FormatAutodetectionError && error.message).toBe('No suitable subtitle format')
			}
		})

		it('should list candidates when ambiguous', () => {
			const text = '{1}{2}a\n[1][2]b\n'

			expect(detectSubtitleFormat(text)).toBeNull()
			try {
				autodetectFormat(text)
				expect.unreachable()
			} catch (error) {
				expect(error instanceof FormatAutodetectionError && error.candidates).toEqual(['microdvd', 'mpl2'])
			}
		})
	})

	describe('decodeText', () => {
		it('should strip the byte order mark', () => {
			expect(decodeText('\uFEFFhello')).toBe('hello')
			expect(decodeText(new TextEncoder().encode('\uFEFFhello'))).toBe('hello')
		})

		it('should use the encoding detector for bytes', () => {
			const bytes = new Uint8Array([0x63, 0x61, 0x66, 0xe9])
			const detect = (data: Uint8Array) => ({ encoding: 'latin1', text: String.fromCharCode(...data) })

			expect(decodeText(bytes, detect)).toBe('café')
			expect(decodeText('plain', detect)).toBe('plain')
		})
	})

	describe('readSubtitles', () => {
		it('should detect the format of bytes', () => {
			const { document, format, warnings } = readSubtitles(new TextEncoder().encode(`\uFEFF${srt}`))

			expect(format).toBe('srt')
			expect(warnings).toEqual([])
			expect(document.events.map(e => [e.start, e.end, e.text])).toEqual([[1000, 2500, 'Hello']])
		})

		it('should take an explicit format and options', () => {
			const { document, format } = readSubtitles('{25}{50}a\n', { format: 'microdvd', fps: 25 })

			expect(format).toBe('microdvd')
			expect(document.events[0]?.start).toBe(1000)
		})

		it('should reject unknown formats', () => {
			expect(() => readSubtitles(srt, { format: 'xyz' })).toThrow(UnknownFormatError)
		})
	})

	describe('convertSubtitles', () => {
		it('should reproduce SubRip', () => {
			const { read, write } = convertSubtitles(srt, { to: 'srt' })

			expect(read.format).toBe('srt')
			expect(write.text).toBe(srt)
			expect(write.lossyCount).toBe(0)
		})

		it('should drop a color override on the way to SubRip', () => {
			const ass = encodeAss(new SubtitleDocument([{ start: 0, end: 1000, text: '{\\c&H0000FF&}H{\\c}ello' }])).text
			const { read, write } = convertSubtitles(ass, { to: 'srt' })

			expect(read.format).toBe('ass')
			expect(write.text).toBe('1\n00:00:00,000 --> 00:00:01,000\nHello\n\n')
			expect(write.lossyCount).toBe(1)
			expect(write.notes.map(note => [note.feature, note.action, note.eventIndex])).toEqual([['color', 'drop', 0]])
		})

		it('should pass write options through', () => {
			const { write } = convertSubtitles(srt, { to: 'vtt', write: { vttTimestamp: 'short' } })

			expect(write.text).toBe('WEBVTT\n\n00:01.000 --> 00:02.500\nHello\n\n')
		})
	})

	describe('writeSubtitles', () => {
		it('should write representable documents without loss and read them back', () => {
			for (const format of FORMAT_IDENTIFIERS) {
				const document = plainDocument()
				const result = writeSubtitles(document, format, { fps: 25 })
				const back = readSubtitles(result.text, { format, fps: 25 }).document

				expect(result.lossyCount, format).toBe(0)
				expect(
					back.events.map(e => [e.start, e.end, e.text]),
					format
				).toEqual(document.events.map(e => [e.start, e.end, e.text]))
			}
		})

		it('should report features a target cannot express', () => {
			const document = new SubtitleDocument([{ start: 0, end: 1000, text: '{\\pos(10,10)}Hi' }])

			for (const format of ['srt', 'vtt', 'microdvd', 'mpl2', 'tmp'] as const) {
				const result = writeSubtitles(document, format, { fps: 25 })
				expect(result.notes.map(note => note.feature), format).toContain('position')
			}
			expect(writeSubtitles(document, 'ass').lossyCount).toBe(0)
		})
	})
})
