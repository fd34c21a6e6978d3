/**
 * subforge CLI - subtitle format converter
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { CODECS, readSubtitles, writeSubtitles, type LoadOptions } from '@subforge/codecs'
import {
	FORMAT_IDENTIFIERS,
	assertSubtitleFormat,
	getExtension,
	getFormatFromExtension,
	type SubtitleFormat,
	type WriteOptions,
} from '@subforge/core'
import { createLogger, setLogLevel } from './logger'

export { createLogger, setLogLevel, type LogLevel, type Logger } from './logger'

const logger = createLogger('cli')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	// Formats
	from?: string
	to?: string
	fps?: number

	// Output
	out?: string
	overwrite?: boolean
	crlf?: boolean
	msDot?: boolean

	// Retiming
	shift?: number
	transformFps?: { from: number; to: number }

	// Parsing
	lenient?: boolean
	keepHtml?: boolean
	keepUnknownHtml?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean

	// Commands
	formats?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Bad command line, reported without a stack
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const HELP = `
subforge - Subtitle format converter

USAGE:
  subforge <input> [output]           Convert a single file
  subforge <pattern> --to <format>    Batch convert files
  subforge --formats                  List supported formats

OPTIONS:
  -f, --from <format>      Input format (detected from content by default)
  -t, --to <format>        Output format (from the output extension by default)
  --fps <n>                Frame rate for MicroDVD input and output
  --shift <ms>             Shift all subtitles (negative moves them earlier)
  --transform-fps <in:out> Retime subtitles from one frame rate to another
  --lenient                Skip malformed records instead of failing
  --keep-html              Keep HTML-like markup in SubRip/WebVTT input verbatim
  --keep-unknown-html      Convert known markup but keep unknown tags
  --crlf                   Write CRLF line endings
  --ms-dot                 Write SubRip times with "." before milliseconds
  -o, --out <dir>          Output directory for batch conversion
  --overwrite              Overwrite existing files
  --dry-run                Show what would be done without doing it
  -v, --verbose            Verbose output
  --quiet                  Only report errors
  --help                   Show this help
  --version                Show version

EXAMPLES:
  subforge movie.ass movie.srt                 # Convert ASS to SubRip
  subforge movie.srt --to vtt                  # Convert to WebVTT (auto name)
  subforge "*.srt" --to ass -o out/            # Batch convert
  subforge movie.sub movie.srt --fps 23.976    # MicroDVD needs a frame rate
  subforge movie.srt fixed.srt --shift -1500   # Move everything 1.5s earlier
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

function parseNumber(flag: string, value: string): number {
	const number = Number(value)
	if (value.trim() === '' || !Number.isFinite(number)) {
		throw new UsageError(`${flag} expects a number, got "${value}"`)
	}
	return number
}

function parseFpsPair(value: string): { from: number; to: number } {
	const [from, to, ...rest] = value.split(':')
	if (from === undefined || to === undefined || rest.length > 0) {
		throw new UsageError(`--transform-fps expects <in:out>, got "${value}"`)
	}
	return { from: parseNumber('--transform-fps', from), to: parseNumber('--transform-fps', to) }
}

export function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	const value = (flag: string): string => {
		const next = args[i + 1]
		if (next === undefined) throw new UsageError(`Missing value for ${flag}`)
		i++
		return next
	}

	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--formats') {
			options.formats = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--lenient') {
			options.lenient = true
		} else if (arg === '--keep-html') {
			options.keepHtml = true
		} else if (arg === '--keep-unknown-html') {
			options.keepUnknownHtml = true
		} else if (arg === '--crlf') {
			options.crlf = true
		} else if (arg === '--ms-dot') {
			options.msDot = true
		} else if (arg === '--from' || arg === '-f') {
			options.from = value(arg)
		} else if (arg === '--to' || arg === '-t') {
			options.to = value(arg)
		} else if (arg === '--out' || arg === '-o') {
			options.out = value(arg)
		} else if (arg === '--fps') {
			options.fps = parseNumber(arg, value(arg))
		} else if (arg === '--shift') {
			options.shift = Math.round(parseNumber(arg, value(arg)))
		} else if (arg === '--transform-fps') {
			options.transformFps = parseFpsPair(value(arg))
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Glob Pattern Matching
// ─────────────────────────────────────────────────────────────────────────────

function isGlob(pattern: string): boolean {
	return pattern.includes('*') || pattern.includes('?')
}

export function matchGlob(pattern: string, path: string): boolean {
	const source = pattern
		.split('**')
		.map(part => part.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '[^/]*').replace(/\?/g, '[^/]'))
		.join('.*')

	return new RegExp(`^${source}$`).test(path)
}

/**
 * Files matching a pattern, sorted; a plain path matches itself when it is a file
 */
export function expandGlob(pattern: string, baseDir = '.'): string[] {
	if (!isGlob(pattern)) {
		const path = resolve(baseDir, pattern)
		return existsSync(path) && statSync(path).isFile() ? [path] : []
	}

	// split into the literal directory part and the glob part
	const parts = pattern.split('/')
	const firstGlob = parts.findIndex(isGlob)
	const base = resolve(baseDir, parts.slice(0, firstGlob).join('/') || '.')
	const filePattern = parts.slice(firstGlob).join('/')
	const recursive = filePattern.includes('**')
	const results: string[] = []

	function walk(dir: string): void {
		if (!existsSync(dir)) return

		for (const entry of readdirSync(dir, { withFileTypes: true })) {
			const path = join(dir, entry.name)

			if (entry.isDirectory()) {
				if (recursive) walk(path)
			} else if (entry.isFile() && matchGlob(filePattern, path.slice(base.length + 1))) {
				results.push(path)
			}
		}
	}

	walk(base)
	return results.sort()
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showHelp(): void {
	console.log(HELP)
}

function showVersion(): void {
	console.log(`subforge v${VERSION}`)
}

function showFormats(): void {
	console.log('\nSupported Formats:\n')
	for (const format of FORMAT_IDENTIFIERS) {
		const codec = CODECS[format]
		console.log(`  ${format.padEnd(10)}${codec.name} (${codec.extensions.join(', ')})`)
	}
	console.log()
}

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

interface ConvertJob {
	input: string
	output: string
	format: SubtitleFormat
}

function readOptions(options: CliOptions): LoadOptions {
	return {
		format: options.from,
		mode: options.lenient ? 'lenient' : 'strict',
		fps: options.fps,
		keepHtmlTags: options.keepHtml,
		keepUnknownHtml: options.keepUnknownHtml,
	}
}

function writeOptions(options: CliOptions): WriteOptions {
	return {
		fps: options.fps,
		lineBreak: options.crlf ? 'crlf' : 'lf',
		msSeparator: options.msDot ? '.' : ',',
	}
}

/**
 * Convert one file; parse warnings, write warnings and lossy mappings are logged
 */
function convertFile(job: ConvertJob, options: CliOptions): void {
	const name = basename(job.input)
	const { document, format, warnings } = readSubtitles(new Uint8Array(readFileSync(job.input)), readOptions(options))
	logger.debug(`Read ${name} as ${format}`, { events: document.events.length, styles: document.styles.size })

	for (const warning of warnings) {
		logger.warn(`${name}: ${warning.message}`)
	}

	if (options.transformFps) {
		document.transformFramerate(options.transformFps.from, options.transformFps.to)
	}
	if (options.shift) {
		document.shift(options.shift)
	}

	const result = writeSubtitles(document, job.format, writeOptions(options))

	for (const warning of result.warnings) {
		logger.warn(`${name}: ${warning.message}`)
	}
	for (const note of result.notes) {
		const where = note.eventIndex === undefined ? `style ${note.style ?? ''}` : `event ${note.eventIndex}`
		logger.debug(`${name}: ${note.action} ${note.feature} (${where}): ${note.detail}`)
	}
	if (result.lossyCount > 0) {
		logger.warn(`${name}: ${result.lossyCount} lossy mapping(s) to ${job.format}`)
	}

	const outDir = dirname(job.output)
	if (!existsSync(outDir)) {
		mkdirSync(outDir, { recursive: true })
	}
	writeFileSync(job.output, result.text)
}

function outputFormat(options: CliOptions, output?: string): SubtitleFormat {
	if (options.to) return assertSubtitleFormat(options.to)
	if (output) return getFormatFromExtension(extname(output))
	throw new UsageError('--to <format> is required when no output file is given')
}

function buildJobs(inputs: string[], options: CliOptions): ConvertJob[] {
	const jobs: ConvertJob[] = []

	// Single file mode: <input> <output>
	if (inputs.length === 2 && !isGlob(inputs[0]!) && !isGlob(inputs[1]!)) {
		const input = resolve(inputs[0]!)
		if (!existsSync(input)) throw new UsageError(`File not found: ${input}`)

		const output = resolve(inputs[1]!)
		const format = outputFormat(options, output)
		if (existsSync(output) && !options.overwrite) {
			logger.info(`Skip: ${output} (exists, use --overwrite)`)
			return jobs
		}
		jobs.push({ input, output, format })
		return jobs
	}

	// Batch mode
	const pattern = inputs[0]
	if (!pattern || inputs.length > 1) throw new UsageError('Expected <input> [output] or a single pattern')

	const files = expandGlob(pattern)
	if (files.length === 0) throw new UsageError(`No files matched: ${pattern}`)

	const format = outputFormat(options)
	const outDir = options.out ? resolve(options.out) : null

	for (const input of files) {
		const output = join(outDir ?? dirname(input), `${basename(input, extname(input))}${getExtension(format)}`)

		if (resolve(input) === output && !options.overwrite) {
			logger.info(`Skip: ${input} (same as output)`)
			continue
		}
		if (existsSync(output) && !options.overwrite) {
			logger.info(`Skip: ${output} (exists, use --overwrite)`)
			continue
		}

		jobs.push({ input, output, format })
	}

	return jobs
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Run the command line
 * @returns exit code: 1 when a file failed to convert or the command line is bad
 */
export async function main(argv: readonly string[]): Promise<number> {
	let parsed: ReturnType<typeof parseArgs>
	try {
		parsed = parseArgs(argv)
	} catch (error) {
		logger.error(errorMessage(error))
		return 1
	}
	const { inputs, options } = parsed

	setLogLevel(options.verbose ? 'debug' : options.quiet ? 'error' : 'info')

	// Handle commands
	if (options.help || (inputs.length === 0 && !options.formats && !options.version)) {
		showHelp()
		return 0
	}

	if (options.version) {
		showVersion()
		return 0
	}

	if (options.formats) {
		showFormats()
		return 0
	}

	let jobs: ConvertJob[]
	try {
		jobs = buildJobs(inputs, options)
	} catch (error) {
		logger.error(errorMessage(error))
		return 1
	}

	if (jobs.length === 0) {
		logger.info('No files to convert')
		return 0
	}

	// Dry run
	if (options.dryRun) {
		logger.info('Dry run - would convert:')
		for (const job of jobs) {
			logger.info(`  ${job.input} → ${job.output} (${job.format})`)
		}
		return 0
	}

	// Execute jobs
	let success = 0
	let failed = 0

	for (const job of jobs) {
		logger.info(`${basename(job.input)} → ${basename(job.output)}`)

		try {
			convertFile(job, options)
			success++
		} catch (error) {
			failed++
			logger.error(`${basename(job.input)}: ${errorMessage(error)}`)
		}
	}

	// Summary
	if (jobs.length > 1) {
		logger.info(`Done: ${success} converted, ${failed} failed`)
	}

	return failed > 0 ? 1 : 0
}
