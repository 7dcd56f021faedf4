/**
 * IPTC reader entry points
 */

import { BufferSource, type ByteSource, FileSource } from '@iimkit/core'
import { decodeIptc } from './decoder'
import { ownValue } from './metadata'
import { scanForIptc } from './scanner'
import type { DecodeResult, IptcMetadata, ReadOptions, StopReason } from './types'

/**
 * Decoded IPTC record 2 of one image
 */
export class IptcInfo {
	readonly metadata: IptcMetadata
	readonly stopReason: StopReason
	readonly discarded: readonly number[]

	constructor(
		/** Offset of the record version tag */
		readonly offset: number,
		result: DecodeResult
	) {
		this.metadata = result.metadata
		this.stopReason = result.stopReason
		this.discarded = result.discarded
	}

	/**
	 * Value of a single-valued attribute, e.g. 'caption/abstract'
	 */
	attribute(name: string): string | undefined {
		return ownValue(this.metadata.scalars, name)
	}

	keywords(): string[] | undefined {
		return ownValue(this.metadata.lists, 'keywords')
	}

	supplementalCategories(): string[] | undefined {
		return ownValue(this.metadata.lists, 'supplemental category')
	}
}

/**
 * Scan a source for IPTC data and decode it
 */
export function readIptc(source: ByteSource, options: ReadOptions = {}): IptcInfo | null {
	const scan = scanForIptc(source, options)
	if (!scan.found) return null

	return new IptcInfo(scan.offset, decodeIptc(source, options))
}

/**
 * Extract IPTC data from an in-memory file
 */
export function parseIptc(data: Uint8Array, options: ReadOptions = {}): IptcInfo | null {
	return readIptc(new BufferSource(data), options)
}

/**
 * Extract IPTC data from a file on disk
 */
export function readIptcFile(path: string, options: ReadOptions = {}): IptcInfo | null {
	const source = new FileSource(path)
	try {
		return readIptc(source, options)
	} finally {
		source.close()
	}
}
