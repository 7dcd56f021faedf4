/**
 * IIM record 2 decoder
 * Walks tags from the scanner's offset until the record ends
 */

import type { ByteSource } from '@iimkit/core'
import {
	APPLICATION_RECORD,
	type DecodeOptions,
	type DecodeResult,
	IIM_MARKER,
	IPTC_REGISTRY,
	type IptcEncoding,
	type IptcTagHeader,
	type StopReason,
	TAG_HEADER_SIZE,
} from './types'
import { createMetadata, ownValue } from './metadata'

/**
 * Decode consecutive record 2 tags from the cursor.
 * Never throws on malformed data; the stop reason tells why it ended.
 */
export function decodeIptc(source: ByteSource, options: DecodeOptions = {}): DecodeResult {
	const registry = options.registry ?? IPTC_REGISTRY
	const encoding = options.encoding ?? 'latin1'

	const metadata = createMetadata()
	const discarded: number[] = []
	let stopReason: StopReason

	while (true) {
		const headerStart = source.position
		const header = readTagHeader(source)
		if (!header) {
			stopReason = 'source-exhausted'
			source.seek(headerStart)
			break
		}

		if (header.marker !== IIM_MARKER || header.record !== APPLICATION_RECORD) {
			stopReason = 'record-ended'
			source.seek(headerStart)
			break
		}

		const value = source.read(header.length)
		if (value.length < header.length) {
			stopReason = 'value-truncated'
			source.seek(headerStart)
			break
		}

		const listName = registry.listName(header.dataset)
		if (listName !== undefined) {
			const list = ownValue(metadata.lists, listName) ?? []
			list.push(decodeText(value, encoding))
			metadata.lists[listName] = list
			continue
		}

		const name = registry.scalarName(header.dataset)
		if (name !== undefined) {
			metadata.scalars[name] = decodeText(value, encoding)
		} else {
			discarded.push(header.dataset)
		}
	}

	return { metadata, stopReason, discarded, endOffset: source.position }
}

/**
 * Read a five byte tag header, or null if the source runs out
 */
export function readTagHeader(source: ByteSource): IptcTagHeader | null {
	const bytes = source.read(TAG_HEADER_SIZE)
	const [marker, record, dataset, high, low] = bytes
	if (
		marker === undefined ||
		record === undefined ||
		dataset === undefined ||
		high === undefined ||
		low === undefined
	) {
		return null
	}

	return { marker, record, dataset, length: (high << 8) | low }
}

/**
 * Decode a dataset value to text
 */
export function decodeText(bytes: Uint8Array, encoding: IptcEncoding): string {
	if (encoding === 'utf-8') {
		return new TextDecoder('utf-8').decode(bytes)
	}

	let str = ''
	for (let i = 0; i < bytes.length; i++) {
		str += String.fromCharCode(bytes[i] ?? 0)
	}
	return str
}
