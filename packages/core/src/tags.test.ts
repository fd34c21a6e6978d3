import { describe, expect, it } from 'vitest'
import {
	UnterminatedOverrideBlockError,
	createStyle,
	parseTags,
	scanTags,
	serializeTags,
	stripTags,
	styledFragments,
	type Style,
} from './index'

describe('tags', () => {
	describe('parseTags', () => {
		it('should split text into runs', () => {
			expect(parseTags('{\\b1}Bold{\\b0} normal')).toEqual([
				{ directives: [{ kind: 'bold', value: true }], text: 'Bold' },
				{ directives: [{ kind: 'bold', value: false }], text: ' normal' },
			])
		})

		it('should return a single run for plain text', () => {
			expect(parseTags('Hello, world!')).toEqual([{ directives: [], text: 'Hello, world!' }])
			expect(parseTags('')).toEqual([])
		})

		it('should merge adjacent blocks into one run', () => {
			expect(parseTags('{\\b1}{\\i1}x')).toEqual([
				{
					directives: [
						{ kind: 'bold', value: true },
						{ kind: 'italic', value: true },
					],
					text: 'x',
				},
			])
		})

		it('should recognize known directives', () => {
			const [run] = parseTags(
				'{\\c&H0000FF&\\3c&HFF0000&\\alpha&H80&\\an8\\a6\\fnArial Black\\fs32\\b700\\pos(320,240)\\p1\\rAlt}x'
			)

			expect(run?.directives).toEqual([
				{ kind: 'color', slot: 1, color: { r: 255, g: 0, b: 0, a: 0 } },
				{ kind: 'color', slot: 3, color: { r: 0, g: 0, b: 255, a: 0 } },
				{ kind: 'alpha', slot: 0, alpha: 128 },
				{ kind: 'alignment', value: 8 },
				{ kind: 'alignment', value: 8, legacy: 6 },
				{ kind: 'fontName', value: 'Arial Black' },
				{ kind: 'fontSize', value: 32 },
				{ kind: 'bold', value: true, weight: 700 },
				{ kind: 'position', x: 320, y: 240 },
				{ kind: 'drawing', scale: 1 },
				{ kind: 'reset', style: 'Alt' },
			])
		})

		it('should keep unknown directives verbatim', () => {
			const [run] = parseTags('{\\blur2\\fad(100,200)}Hi')

			expect(run?.directives).toEqual([
				{ kind: 'unknown', raw: 'blur2' },
				{ kind: 'unknown', raw: 'fad(100,200)' },
			])
		})

		it('should not split inside parentheses', () => {
			const [run] = parseTags('{\\t(0,500,\\fs40)}x')

			expect(run?.directives).toEqual([{ kind: 'unknown', raw: 't(0,500,\\fs40)' }])
		})

		it('should close a block inside an unbalanced parenthesis', () => {
			expect(parseTags('{\\clip(1,2}text')).toEqual([
				{ directives: [{ kind: 'unknown', raw: 'clip(1,2' }], text: 'text' },
			])
		})

		it('should keep block comments', () => {
			expect(parseTags('{TL note}text')).toEqual([
				{ directives: [{ kind: 'comment', text: 'TL note' }], text: 'text' },
			])
		})

		it('should fail on an unterminated block', () => {
			expect(() => parseTags('Hello {\\b1 world')).toThrow(UnterminatedOverrideBlockError)
			try {
				parseTags('Hello {\\b1 world')
			} catch (error) {
				expect(error).toBeInstanceOf(UnterminatedOverrideBlockError)
				if (error instanceof UnterminatedOverrideBlockError) expect(error.position).toBe(6)
			}
		})

		it('should keep an unterminated block as text in lenient mode', () => {
			expect(parseTags('Hello {\\b1 world', { lenient: true })).toEqual([
				{ directives: [], text: 'Hello {\\b1 world' },
			])
		})
	})

	describe('scanTags', () => {
		it('should be restartable', () => {
			const runs = scanTags('a{\\i1}b')

			expect([...runs]).toEqual([...runs])
		})

		it('should yield runs before reaching a later error', () => {
			const iterator = scanTags('ok{\\b1}fine{broken')[Symbol.iterator]()

			expect(iterator.next().value).toEqual({ directives: [], text: 'ok' })
			expect(() => iterator.next()).toThrow(UnterminatedOverrideBlockError)
		})
	})

	describe('serializeTags', () => {
		const samples = [
			'{\\b1}Bold{\\b0} normal',
			'{\\an8\\pos(10,20)}Top',
			'a{\\i1}b{\\i0}c{\\u1}d',
			'{\\blur3}x{\\c&H00FF00&}y',
			'{TL note}text',
		]

		it('should reproduce canonical text', () => {
			for (const sample of samples) {
				expect(serializeTags(parseTags(sample))).toBe(sample)
				expect(parseTags(serializeTags(parseTags(sample)))).toEqual(parseTags(sample))
			}
		})

		it('should omit directives that change nothing', () => {
			expect(serializeTags(parseTags('{\\b1}a{\\b1}b{\\i1\\b1}c'))).toBe('{\\b1}ab{\\i1}c')
		})

		it('should omit directives equal to the base style', () => {
			expect(serializeTags(parseTags('{\\b0\\i1}x'), createStyle())).toBe('{\\i1}x')
		})

		it('should write merged blocks as one', () => {
			expect(serializeTags(parseTags('{\\b1}{\\i1}x'))).toBe('{\\b1\\i1}x')
		})

		it('should keep directives after a reset', () => {
			expect(serializeTags(parseTags('{\\b1}a{\\r}b{\\b1}c'))).toBe('{\\b1}a{\\r}b{\\b1}c')
		})
	})

	describe('styledFragments', () => {
		const base = createStyle()
		const summary = (text: string, styles?: ReadonlyMap<string, Style>) =>
			styledFragments(text, base, styles).map(f => [f.text, f.style.italic, f.style.bold, f.drawing])

		it('should resolve plain text to the base style', () => {
			expect(summary('Hello, world!')).toEqual([['Hello, world!', false, false, false]])
		})

		it('should apply emphasis', () => {
			expect(summary('Hello, {\\i1}world{\\i0}!')).toEqual([
				['Hello, ', false, false, false],
				['world', true, false, false],
				['!', false, false, false],
			])
		})

		it('should reset to the base style', () => {
			expect(summary('{\\i1}Hello, {\\r}world!')).toEqual([
				['Hello, ', true, false, false],
				['world!', false, false, false],
			])
		})

		it('should reset to a named style', () => {
			const styles = new Map([['other style', createStyle({ bold: true })]])

			expect(summary('Hello, {\\rother style\\i1}world!', styles)).toEqual([
				['Hello, ', false, false, false],
				['world!', true, true, false],
			])
		})

		it('should track drawing mode', () => {
			expect(summary('{\\p1}m 0 0 l 100 0 100 100 0 100{\\p0}test')).toEqual([
				['m 0 0 l 100 0 100 100 0 100', false, false, true],
				['test', false, false, false],
			])
		})

		it('should not take unknown tags for drawing mode', () => {
			expect(summary('test{\\paws}test')).toEqual([
				['test', false, false, false],
				['test', false, false, false],
			])
		})

		it('should apply colors without touching alpha', () => {
			const [fragment] = styledFragments('{\\alpha&H40&\\c&H0000FF&}red', base)

			expect(fragment?.style.primaryColor).toEqual({ r: 255, g: 0, b: 0, a: 0x40 })
			expect(base.primaryColor).toEqual({ r: 255, g: 255, b: 255, a: 0 })
		})
	})

	it('should strip override blocks', () => {
		expect(stripTags('{\\b1}a{x}b')).toBe('ab')
	})
})
