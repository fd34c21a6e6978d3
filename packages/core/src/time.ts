/**
 * Subtitle time handling
 * Times are integer milliseconds; each format has its own grammar and resolution
 */

import { InvalidTimingError, MalformedTimestampError, MissingFrameRateError } from './errors'
import type { Time, TimeFormat } from './types'

/** Largest time SubRip can express (99:59:59,999) */
export const MAX_SRT_TIME: Time = 100 * 3600000 - 1

const ASS_TIMESTAMP = /^(\d+):(\d{1,2}):(\d{1,2})\.(\d{1,3})$/
const SRT_TIMESTAMP = /^(\d{1,2}):(\d{1,2}):(\d{1,2})[,.](\d{1,3})$/
const VTT_TIMESTAMP = /^(?:(\d{2,}):)?(\d{2}):(\d{2})\.(\d{2,3})$/
const TMP_TIMESTAMP = /^(\d+):(\d{2}):(\d{2})$/
const INTEGER = /^\d+$/

/**
 * Normalized (h, m, s, ms) tuple
 */
export interface Times {
	h: number
	m: number
	s: number
	ms: number
}

/**
 * Build a time from components or from a frame count
 */
export function makeTime(parts: Partial<Times>): Time
export function makeTime(parts: { frames: number; fps: number }): Time
export function makeTime(parts: Partial<Times> | { frames: number; fps: number }): Time {
	if ('frames' in parts) {
		return framesToMs(parts.frames, parts.fps)
	}
	const { h = 0, m = 0, s = 0, ms = 0 } = parts
	return Math.round(h * 3600000 + m * 60000 + s * 1000 + ms)
}

/**
 * Split milliseconds into normalized components
 */
export function msToTimes(time: Time): Times {
	let rest = Math.round(time)
	const h = Math.floor(rest / 3600000)
	rest -= h * 3600000
	const m = Math.floor(rest / 60000)
	rest -= m * 60000
	const s = Math.floor(rest / 1000)
	return { h, m, s, ms: rest - s * 1000 }
}

function checkFps(fps: number | undefined, context: string): number {
	if (fps === undefined) throw new MissingFrameRateError(context)
	if (!Number.isFinite(fps) || fps <= 0) {
		throw new InvalidTimingError(`Frame rate must be a positive number, got ${fps}`)
	}
	return fps
}

export function framesToMs(frames: number, fps: number): Time {
	return Math.round((frames * 1000) / checkFps(fps, 'Frame conversion'))
}

export function msToFrames(time: Time, fps: number): number {
	return Math.round((time * checkFps(fps, 'Frame conversion')) / 1000)
}

/**
 * Parse a timestamp in the given format's grammar
 */
export function parseTime(text: string, format: TimeFormat, fps?: number): Time {
	const value = text.trim()

	switch (format) {
		case 'ass':
			return fromClock(value, format, value.match(ASS_TIMESTAMP))
		case 'srt':
			return fromClock(value, format, value.match(SRT_TIMESTAMP))
		case 'vtt':
			return fromClock(value, format, value.match(VTT_TIMESTAMP))
		case 'tmp': {
			const match = value.match(TMP_TIMESTAMP)
			return fromClock(value, format, match && [match[0], match[1], match[2], match[3], undefined])
		}
		case 'mpl2':
			if (!INTEGER.test(value)) throw new MalformedTimestampError(text, format)
			return parseInt(value, 10) * 100
		case 'microdvd':
			if (!INTEGER.test(value)) throw new MalformedTimestampError(text, format)
			return framesToMs(parseInt(value, 10), checkFps(fps, 'MicroDVD timestamp'))
	}
}

function fromClock(
	text: string,
	format: TimeFormat,
	match: ArrayLike<string | undefined> | null
): Time {
	if (!match) throw new MalformedTimestampError(text, format)

	const hours = match[1] ? parseInt(match[1], 10) : 0
	const minutes = parseInt(match[2] ?? '0', 10)
	const seconds = parseInt(match[3] ?? '0', 10)
	const fraction = match[4] ?? ''

	if (minutes >= 60) throw new MalformedTimestampError(text, format, 'minutes out of range')
	if (seconds >= 60) throw new MalformedTimestampError(text, format, 'seconds out of range')

	// "5" is 500 ms, "05" is 50 ms, "005" is 5 ms
	const ms = fraction ? parseInt(fraction, 10) * 10 ** (3 - fraction.length) : 0
	return hours * 3600000 + minutes * 60000 + seconds * 1000 + ms
}

/**
 * Format a time in the given format's grammar, rounding to its resolution
 */
export function formatTime(time: Time, format: TimeFormat, fps?: number): string {
	const ms = Math.max(0, Math.round(time))

	switch (format) {
		case 'ass': {
			const { h, m, s, ms: rest } = msToTimes(Math.round(ms / 10) * 10)
			return `${h}:${pad(m, 2)}:${pad(s, 2)}.${pad(rest / 10, 2)}`
		}
		case 'srt': {
			const { h, m, s, ms: rest } = msToTimes(Math.min(ms, MAX_SRT_TIME))
			return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(rest, 3)}`
		}
		case 'vtt': {
			const { h, m, s, ms: rest } = msToTimes(ms)
			return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)}.${pad(rest, 3)}`
		}
		case 'tmp': {
			const { h, m, s } = msToTimes(Math.round(ms / 1000) * 1000)
			return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)}`
		}
		case 'mpl2':
			return String(Math.round(ms / 100))
		case 'microdvd':
			return String(msToFrames(ms, checkFps(fps, 'MicroDVD timestamp')))
	}
}

/**
 * The value a time takes after a round trip through a format's grammar
 */
export function quantizeTime(time: Time, format: TimeFormat, fps?: number): Time {
	return parseTime(formatTime(time, format, fps), format, fps)
}

/**
 * Shift a time, clamping at zero
 */
export function shiftTime(time: Time, delta: number): Time {
	return Math.max(0, Math.round(time + delta))
}

/**
 * Pretty-print as [-]H:MM:SS.mmm (diagnostics)
 */
export function msToString(time: number): string {
	const sign = time < 0 ? '-' : ''
	const { h, m, s, ms } = msToTimes(Math.abs(time))
	return `${sign}${h}:${pad(m, 2)}:${pad(s, 2)}.${pad(ms, 3)}`
}

function pad(value: number, width: number): string {
	return String(value).padStart(width, '0')
}
