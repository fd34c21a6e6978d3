import { MalformedInputError, SubtitleDocument, createStyle } from '@subforge/core'
import { describe, expect, it } from 'vitest'
import { SrtCodec, decodeSrt, encodeSrt, isSrt } from './index'

function documentOf(...texts: string[]): SubtitleDocument {
	return new SubtitleDocument(texts.map((text, i) => ({ start: (i + 1) * 1000, end: (i + 2) * 1000, text })))
}

describe('SubRip Codec', () => {
	const sampleSrt = `1
00:00:01,000 --> 00:00:04,000
Hello, world!

2
00:00:05,000 --> 00:00:08,500
This is a subtitle test.

3
00:00:10,000 --> 00:00:15,000
Multiple lines
are supported.
`

	describe('isSrt', () => {
		it('should identify SRT files', () => {
			expect(isSrt(sampleSrt)).toBe(true)
			expect(new SrtCodec().canDecode(sampleSrt)).toBe(true)
		})

		it('should reject non-SRT files', () => {
			expect(isSrt('WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nHello')).toBe(false)
			expect(isSrt('[Script Info]\n\n1\n00:00:01,000 --> 00:00:02,000\nHello')).toBe(false)
			expect(isSrt('not a subtitle file')).toBe(false)
		})
	})

	describe('decodeSrt', () => {
		it('should decode cues', () => {
			const { document, warnings } = decodeSrt(sampleSrt)

			expect(warnings).toEqual([])
			expect(document.format).toBe('srt')
			expect(document.events.map(e => [e.start, e.end, e.text])).toEqual([
				[1000, 4000, 'Hello, world!'],
				[5000, 8500, 'This is a subtitle test.'],
				[10000, 15000, 'Multiple lines\nare supported.'],
			])
		})

		it('should convert emphasis markup to override tags', () => {
			const { document } = decodeSrt('1\n00:00:01,000 --> 00:00:02,000\n<i>Hello</i> <b>world</b>\n')

			expect(document.events[0]?.text).toBe('{\\i1}Hello{\\i0} {\\b1}world{\\b0}')
		})

		it('should strip or keep unknown markup', () => {
			const srt = '1\n00:00:01,000 --> 00:00:02,000\n<font color="red">Hi</font> &lt;3\n'

			expect(decodeSrt(srt).document.events[0]?.text).toBe('Hi <3')
			expect(decodeSrt(srt, { keepUnknownHtml: true }).document.events[0]?.text).toBe(
				'<font color="red">Hi</font> &lt;3'
			)
			expect(decodeSrt('1\n00:00:01,000 --> 00:00:02,000\n<i>x</i>\n', { keepHtmlTags: true }).document.events[0]?.text).toBe(
				'<i>x</i>'
			)
		})

		it('should use an HTML stripping collaborator', () => {
			const srt = '1\n00:00:01,000 --> 00:00:02,000\n<font>Hi</font>\n'
			const { document } = decodeSrt(srt, { stripHtml: text => text.replace('<font>', '').replace('</font>', '!') })

			expect(document.events[0]?.text).toBe('Hi!')
		})

		it('should attach detected languages', () => {
			const { document } = decodeSrt(sampleSrt, { detectLanguage: text => (text.startsWith('Hello') ? 'en' : undefined) })

			expect(document.events.map(e => e.language)).toEqual(['en', undefined, undefined])
		})

		it('should keep blank lines inside a cue', () => {
			const srt = '1\n00:00:01,000 --> 00:00:02,000\nfirst\n\nstill first\n\n2\n00:00:03,000 --> 00:00:04,000\nsecond\n'

			expect(decodeSrt(srt).document.events.map(e => e.text)).toEqual(['first\nstill first', 'second'])
		})

		it('should read empty cues', () => {
			const srt = '1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\nText\n'

			expect(decodeSrt(srt).document.events.map(e => e.text)).toEqual(['', 'Text'])
		})

		it('should accept dot separators and CRLF', () => {
			const { document } = decodeSrt('1\r\n00:00:01.5 --> 00:00:02.000\r\nHello\r\n')

			expect(document.events[0]).toMatchObject({ start: 1500, end: 2000, text: 'Hello' })
		})

		it('should fail on a malformed timing line in strict mode', () => {
			const srt = '1\n00:00:01,000 --> 00:00:0x,000\nHello\n'

			expect(() => decodeSrt(srt)).toThrow(MalformedInputError)
			try {
				decodeSrt(srt)
			} catch (error) {
				expect(error instanceof MalformedInputError && error.line).toBe(2)
			}
		})

		it('should fail on text before the first cue', () => {
			try {
				decodeSrt('garbage\n\n1\n00:00:01,000 --> 00:00:02,000\nok\n')
				expect.unreachable()
			} catch (error) {
				expect(error instanceof MalformedInputError && error.line).toBe(1)
			}
		})

		it('should treat end before start as malformed input', () => {
			expect(() => decodeSrt('1\n00:00:02,000 --> 00:00:01,000\nx\n')).toThrow(MalformedInputError)
		})

		it('should skip malformed cues in lenient mode', () => {
			const srt = '1\n00:00:01,000 --> 00:00:0x,000\nHello\n\n2\n00:00:03,000 --> 00:00:04,000\nok\n'
			const { document, warnings } = decodeSrt(srt, { mode: 'lenient' })

			expect(document.events.map(e => e.text)).toEqual(['ok'])
			expect(warnings).toHaveLength(1)
			expect(warnings[0]).toMatchObject({ code: 'MALFORMED_TIMESTAMP', line: 2 })
		})
	})

	describe('encodeSrt', () => {
		it('should reproduce a simple block byte for byte', () => {
			const srt = '1\n00:00:01,000 --> 00:00:02,500\nHello\n\n'
			const { document } = decodeSrt(srt)

			expect(document.events).toHaveLength(1)
			expect(document.events[0]).toMatchObject({ start: 1000, end: 2500, text: 'Hello' })

			const result = encodeSrt(document)
			expect(result.text).toBe(srt)
			expect(result.lossyCount).toBe(0)
		})

		it('should write emphasis as markup', () => {
			const result = encodeSrt(documentOf('{\\i1}Hello{\\i0} world', '{\\b1}a{\\i1}b{\\b0}c'))

			expect(result.text).toBe(
				'1\n00:00:01,000 --> 00:00:02,000\n<i>Hello</i> world\n\n' +
					'2\n00:00:02,000 --> 00:00:03,000\n<b>a<i>b</i></b><i>c</i>\n\n'
			)
			expect(result.lossyCount).toBe(0)
		})

		it('should write emphasis from the style', () => {
			const document = documentOf('Hi')
			document.setStyle('Default', createStyle({ italic: true }))

			const result = encodeSrt(document)

			expect(result.text).toBe('1\n00:00:01,000 --> 00:00:02,000\n<i>Hi</i>\n\n')
			expect(result.lossyCount).toBe(0)
		})

		it('should drop a color override and report it once', () => {
			const result = encodeSrt(documentOf('Hello {\\c&H0000FF&}red{\\c} world'))

			expect(result.text).toBe('1\n00:00:01,000 --> 00:00:02,000\nHello red world\n\n')
			expect(result.lossyCount).toBe(1)
			expect(result.notes).toEqual([
				{ feature: 'color', action: 'drop', eventIndex: 0, detail: 'Override tag color dropped' },
			])
		})

		it('should skip comments and reject drawings', () => {
			const document = new SubtitleDocument([
				{ start: 0, end: 1000, text: 'note', type: 'Comment' },
				{ start: 0, end: 1000, text: '{\\p1}m 0 0 l 10 10{\\p0}' },
				{ start: 1000, end: 2000, text: 'visible' },
			])

			const result = encodeSrt(document)

			expect(result.text).toBe('1\n00:00:01,000 --> 00:00:02,000\nvisible\n\n')
			expect(result.notes.map(n => [n.feature, n.action, n.eventIndex])).toEqual([
				['comment', 'drop', 0],
				['drawing', 'reject', 1],
			])
			expect(result.lossyCount).toBe(2)
		})

		it('should support dialect options', () => {
			const document = documentOf('Hi')

			expect(encodeSrt(document, { msSeparator: '.' }).text).toBe('1\n00:00:01.000 --> 00:00:02.000\nHi\n\n')
			expect(encodeSrt(document, { lineBreak: 'crlf' }).text).toBe('1\r\n00:00:01,000 --> 00:00:02,000\r\nHi\r\n\r\n')
		})

		it('should drop emphasis when styles are not applied', () => {
			const result = encodeSrt(documentOf('{\\i1}Hi'), { applyStyles: false })

			expect(result.text).toBe('1\n00:00:01,000 --> 00:00:02,000\nHi\n\n')
			expect(result.notes.map(n => n.feature)).toEqual(['emphasis'])
		})

		it('should pass override tags through', () => {
			const result = encodeSrt(documentOf('{\\an8}Top\\hline'), { keepSsaTags: true })

			expect(result.text).toBe('1\n00:00:01,000 --> 00:00:02,000\n{\\an8}Top line\n\n')
			expect(result.lossyCount).toBe(0)
		})

		it('should resolve dangling styles to Default with a warning', () => {
			const document = new SubtitleDocument([{ start: 0, end: 1000, text: 'x', style: 'Missing' }])

			const result = encodeSrt(document)

			expect(result.text).toBe('1\n00:00:00,000 --> 00:00:01,000\nx\n\n')
			expect(result.warnings).toEqual([
				{
					code: 'UNRESOLVED_STYLE_REFERENCE',
					eventIndex: 0,
					style: 'Missing',
					message: 'Event 0 refers to missing style "Missing", using Default',
				},
			])
		})

		it('should clamp times beyond 99:59:59,999', () => {
			const document = new SubtitleDocument([{ start: 0, end: 100 * 3600000, text: 'long' }])

			const result = encodeSrt(document)

			expect(result.text).toBe('1\n00:00:00,000 --> 99:59:59,999\nlong\n\n')
			expect(result.notes.map(n => [n.feature, n.action])).toEqual([['timeOverflow', 'approximate']])
		})

		it('should write an empty document as empty text', () => {
			expect(encodeSrt(new SubtitleDocument())).toEqual({ text: '', lossyCount: 0, notes: [], warnings: [] })
		})

		it('should read back what it writes', () => {
			const document = documentOf('{\\i1}Hello{\\i0}\nworld', '{\\b1}Bold{\\b0} normal', 'plain')

			const { document: copy } = decodeSrt(encodeSrt(document).text)

			expect(copy.events.map(e => e.text)).toEqual(document.events.map(e => e.text))
			expect(copy.events.map(e => [e.start, e.end])).toEqual(document.events.map(e => [e.start, e.end]))
		})
	})
})
