/**
 * IPTC IIM metadata types
 */

/** Byte that starts every IIM tag header */
export const IIM_MARKER = 0x1c

/** Application record: captions, keywords, credits */
export const APPLICATION_RECORD = 2

/** Dataset 2:00, always the first tag of record 2 */
export const RECORD_VERSION_DATASET = 0

/** Size of a tag header: marker, record, dataset, 16-bit length */
export const TAG_HEADER_SIZE = 5

/** Default scan window for the first record 2 tag */
export const DEFAULT_MAX_OFFSET = 512

/**
 * Non-repeating record 2 datasets
 * 0 (record version) and 125 (rasterized caption) are binary and left out
 */
const SCALAR_DATASETS: ReadonlyArray<readonly [number, string]> = [
	[5, 'object name'],
	[7, 'edit status'],
	[8, 'editorial update'],
	[10, 'urgency'],
	[12, 'subject reference'],
	[15, 'category'],
	[22, 'fixture identifier'],
	[26, 'content location code'],
	[27, 'content location name'],
	[30, 'release date'],
	[35, 'release time'],
	[37, 'expiration date'],
	[38, 'expiration time'],
	[40, 'special instructions'],
	[42, 'action advised'],
	[45, 'reference service'],
	[47, 'reference date'],
	[50, 'reference number'],
	[55, 'date created'],
	[60, 'time created'],
	[62, 'digital creation date'],
	[63, 'digital creation time'],
	[65, 'originating program'],
	[70, 'program version'],
	[75, 'object cycle'],
	[80, 'by-line'],
	[85, 'by-line title'],
	[90, 'city'],
	[92, 'sub-location'],
	[95, 'province/state'],
	[100, 'country/primary location code'],
	[101, 'country/primary location name'],
	[103, 'original transmission reference'],
	[105, 'headline'],
	[110, 'credit'],
	[115, 'source'],
	[116, 'copyright notice'],
	[118, 'contact'],
	[120, 'caption/abstract'],
	[122, 'writer/editor'],
	[130, 'image type'],
	[131, 'image orientation'],
	[135, 'language identifier'],
]

/** Repeating record 2 datasets */
const LIST_DATASETS: ReadonlyArray<readonly [number, string]> = [
	[20, 'supplemental category'],
	[25, 'keywords'],
]

/**
 * Dataset id to attribute name tables.
 * Entries are copied on construction and the instance is frozen.
 * A name may not be both scalar and list.
 */
export class DatasetRegistry {
	readonly #scalars: ReadonlyMap<number, string>
	readonly #lists: ReadonlyMap<number, string>

	constructor(
		scalars: Iterable<readonly [number, string]>,
		lists: Iterable<readonly [number, string]>
	) {
		this.#scalars = new Map(scalars)
		this.#lists = new Map(lists)

		const scalarNames = new Set(this.#scalars.values())
		for (const [dataset, name] of this.#lists) {
			if (this.#scalars.has(dataset)) {
				throw new Error(`Dataset ${dataset} registered as both scalar and list`)
			}
			if (scalarNames.has(name)) {
				throw new Error(`Attribute registered as both scalar and list: ${name}`)
			}
		}

		Object.freeze(this)
	}

	/** Name of a single-valued dataset */
	scalarName(dataset: number): string | undefined {
		return this.#scalars.get(dataset)
	}

	/** Name of a repeating dataset */
	listName(dataset: number): string | undefined {
		return this.#lists.get(dataset)
	}

	scalarEntries(): Array<[number, string]> {
		return Array.from(this.#scalars)
	}

	listEntries(): Array<[number, string]> {
		return Array.from(this.#lists)
	}
}

/** Registry for IIM version 4 record 2 */
export const IPTC_REGISTRY = new DatasetRegistry(SCALAR_DATASETS, LIST_DATASETS)

/** Tag header as laid out on the wire */
export interface IptcTagHeader {
	marker: number
	record: number
	dataset: number
	length: number
}

/** Outcome of the marker scan */
export type ScanResult = { found: true; offset: number } | { found: false }

/**
 * Why the decoder stopped
 * - `source-exhausted`: fewer than five bytes left for a header
 * - `record-ended`: a header that is not a record 2 tag
 * - `value-truncated`: a value shorter than its declared length
 */
export type StopReason = 'source-exhausted' | 'record-ended' | 'value-truncated'

/** Text encoding applied to dataset values */
export type IptcEncoding = 'latin1' | 'utf-8'

/** Decoded record 2 attributes */
export interface IptcMetadata {
	/** Single-valued attributes, last occurrence wins */
	scalars: Record<string, string>
	/** Repeating attributes in file order */
	lists: Record<string, string[]>
}

/** Full decoder output */
export interface DecodeResult {
	metadata: IptcMetadata
	stopReason: StopReason
	/** Dataset ids read but not in the registry, in file order */
	discarded: number[]
	/** Cursor position after the last tag consumed */
	endOffset: number
}

/** Scan configuration */
export interface ScanOptions {
	/** Last offset at which the first tag may start (default 512) */
	maxOffset?: number
}

/** Decode configuration */
export interface DecodeOptions {
	registry?: DatasetRegistry
	encoding?: IptcEncoding
}

export type ReadOptions = ScanOptions & DecodeOptions
