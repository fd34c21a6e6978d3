import { MalformedInputError, SubtitleDocument } from '@subforge/core'
import { describe, expect, it } from 'vitest'
import { Mpl2Codec, decodeMpl2, encodeMpl2, isMpl2 } from './index'

describe('MPL2 Codec', () => {
	const sample = '[10][25]Hello|/world\n[30][40]Next\n'

	it('should identify MPL2 files', () => {
		expect(isMpl2(sample)).toBe(true)
		expect(new Mpl2Codec().canDecode(sample)).toBe(true)
		expect(isMpl2('{10}{25}Hello')).toBe(false)
	})

	it('should decode deciseconds and italic lines', () => {
		const { document, warnings } = decodeMpl2(sample)

		expect(warnings).toEqual([])
		expect(document.format).toBe('mpl2')
		expect(document.events.map(e => [e.start, e.end, e.text])).toEqual([
			[1000, 2500, 'Hello\n{\\i1}world{\\i0}'],
			[3000, 4000, 'Next'],
		])
	})

	it('should report malformed lines', () => {
		try {
			decodeMpl2('[10][20]ok\noops\n')
			expect.unreachable()
		} catch (error) {
			expect(error instanceof MalformedInputError && error.line).toBe(2)
		}
	})

	it('should write what it read', () => {
		const result = encodeMpl2(decodeMpl2(sample).document)

		expect(result.text).toBe(sample)
		expect(result.lossyCount).toBe(0)
	})

	it('should approximate emphasis other than whole-line italics', () => {
		const document = new SubtitleDocument([
			{ start: 0, end: 1000, text: '{\\b1}a' },
			{ start: 1000, end: 2000, text: '{\\i1}a{\\i0}b' },
		])
		const result = encodeMpl2(document)

		expect(result.text).toBe('[0][10]a\n[10][20]ab\n')
		expect(result.notes.map(note => [note.feature, note.action, note.eventIndex])).toEqual([
			['emphasis', 'approximate', 0],
			['emphasis', 'approximate', 1],
		])
	})

	it('should note times between deciseconds', () => {
		const document = new SubtitleDocument([{ start: 1050, end: 2000, text: 'a' }])
		const result = encodeMpl2(document)

		expect(result.text).toBe('[11][20]a\n')
		expect(result.notes).toEqual([
			{ feature: 'timePrecision', action: 'approximate', eventIndex: 0, detail: 'Times rounded to mpl2 resolution' },
		])
	})
})
