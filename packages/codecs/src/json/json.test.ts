import { MalformedInputError, SubtitleDocument, createColor, createStyle } from '@subforge/core'
import { describe, expect, it } from 'vitest'
import { JsonCodec, decodeJson, encodeJson, isJson } from './index'

describe('JSON Codec', () => {
	function richDocument(): SubtitleDocument {
		const document = new SubtitleDocument([
			{ start: 0, end: 1000, text: '{\\b1}Sign{\\b0}\nline', style: 'Sign', layer: 2, marginV: 30 },
			{ start: 1000, end: 2005, text: 'note', type: 'Comment', name: 'Editor', effect: 'Karaoke', language: 'en' },
		])
		document.info.set('Title', 'Pilot')
		document.addStyle('Sign', createStyle({ bold: true, primaryColor: createColor(255, 0, 0, 128), alignment: 8 }))
		document.extraSections.push({ format: 'ass', name: 'Fonts', lines: ['fontname: a.ttf'] })
		document.fps = 25
		return document
	}

	it('should identify JSON documents', () => {
		const text = encodeJson(richDocument()).text

		expect(isJson(text)).toBe(true)
		expect(new JsonCodec().canDecode(text)).toBe(true)
		expect(isJson('{1}{25}Hello')).toBe(false)
		expect(isJson('{"info": {}}')).toBe(false)
	})

	it('should roundtrip everything', () => {
		const original = richDocument()
		const result = encodeJson(original)
		const { document, warnings } = decodeJson(result.text)

		expect(result.lossyCount).toBe(0)
		expect(warnings).toEqual([])
		expect(document.equals(original)).toBe(true)
		expect([...document.styles.keys()]).toEqual(['Default', 'Sign'])
		expect(document.events[1]?.language).toBe('en')
		expect(document.extraSections).toEqual(original.extraSections)
		expect(document.fps).toBe(25)
		expect(document.format).toBe('json')
	})

	it('should write plain records', () => {
		const text = encodeJson(new SubtitleDocument([{ start: 0, end: 1000, text: 'Hi' }])).text

		expect(text.endsWith('}\n')).toBe(true)
		expect(JSON.parse(text)).toEqual({
			info: {},
			styles: [{ name: 'Default', ...createStyle() }],
			events: [
				{
					start: 0,
					end: 1000,
					text: 'Hi',
					style: 'Default',
					layer: 0,
					name: '',
					marginL: 0,
					marginR: 0,
					marginV: 0,
					effect: '',
					type: 'Dialogue',
					marked: false,
				},
			],
			extraSections: [],
		})
	})

	it('should resolve dangling style references', () => {
		const result = encodeJson(new SubtitleDocument([{ start: 0, end: 1000, text: 'Hi', style: 'Ghost' }]))

		expect(result.warnings.map(w => [w.code, w.style])).toEqual([['UNRESOLVED_STYLE_REFERENCE', 'Ghost']])
		expect(decodeJson(result.text).document.events[0]?.style).toBe('Default')
	})

	it('should reject malformed input', () => {
		expect(() => decodeJson('{oops')).toThrow(MalformedInputError)
		expect(() => decodeJson('{"events": [{"start": 2000, "end": 1000, "text": "x"}]}')).toThrow(MalformedInputError)

		try {
			decodeJson('{"events": [{"start": "x"}]}')
			expect.unreachable()
		} catch (error) {
			expect(error instanceof Error && error.message).toBe('Line 1: Malformed event record 0')
		}
	})

	it('should keep styles in record order', () => {
		const { document } = decodeJson('{"events": [], "styles": [{"name": "Alt"}, {"name": "Default"}]}')

		expect([...document.styles.keys()]).toEqual(['Alt', 'Default'])
	})

	it('should report duplicate style names', () => {
		const text = '{"events": [], "styles": [{"name": "A", "bold": true}, {"name": "A", "bold": false}]}'

		expect(() => decodeJson(text)).toThrow('Line 1: Duplicate style "A"')

		const { document, warnings } = decodeJson(text, { mode: 'lenient' })
		expect(warnings).toEqual([{ code: 'DUPLICATE_STYLE', line: 1, message: 'Line 1: Duplicate style "A"' }])
		expect(document.getStyle('A')?.bold).toBe(false)
	})

	it('should skip bad records in lenient mode', () => {
		const { document, warnings } = decodeJson(
			'{"events": [{"start": "x"}, {"start": 0, "end": 1000, "text": "ok"}], "styles": [{"name": "Bad", "bold": "yes"}]}',
			{ mode: 'lenient' }
		)

		expect(document.events.map(e => e.text)).toEqual(['ok'])
		expect(document.hasStyle('Bad')).toBe(false)
		expect(warnings.map(w => w.message)).toEqual(['Line 1: Malformed style record', 'Line 1: Malformed event record 0'])
	})
})
