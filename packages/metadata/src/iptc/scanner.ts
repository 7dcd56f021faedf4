/**
 * IIM marker scanner
 * Finds the record version tag (1C 02 00) near the start of a file
 */

import type { ByteSource } from '@iimkit/core'
import {
	APPLICATION_RECORD,
	DEFAULT_MAX_OFFSET,
	IIM_MARKER,
	RECORD_VERSION_DATASET,
	type ScanOptions,
	type ScanResult,
} from './types'

/**
 * Scan for the first record 2 tag.
 * On success the cursor is left on the marker byte.
 */
export function scanForIptc(source: ByteSource, options: ScanOptions = {}): ScanResult {
	const maxOffset = options.maxOffset ?? DEFAULT_MAX_OFFSET
	if (!Number.isInteger(maxOffset) || maxOffset < 0) {
		throw new Error(`Invalid max offset: ${maxOffset}`)
	}

	source.seek(0)

	for (let offset = 0; offset <= maxOffset; offset++) {
		const byte = source.read(1)
		if (byte.length === 0) break

		if (byte[0] !== IIM_MARKER) continue

		const next = source.read(2)
		if (next[0] === APPLICATION_RECORD && next[1] === RECORD_VERSION_DATASET) {
			source.seek(offset)
			return { found: true, offset }
		}

		// False marker: resume on the byte after it
		source.seek(offset + 1)
	}

	return { found: false }
}

/**
 * Check if data carries IIM record 2 within the scan window
 */
export function hasIptc(data: Uint8Array, options: ScanOptions = {}): boolean {
	const maxOffset = Math.min(options.maxOffset ?? DEFAULT_MAX_OFFSET, data.length - 3)

	for (let offset = 0; offset <= maxOffset; offset++) {
		if (
			data[offset] === IIM_MARKER &&
			data[offset + 1] === APPLICATION_RECORD &&
			data[offset + 2] === RECORD_VERSION_DATASET
		) {
			return true
		}
	}

	return false
}
