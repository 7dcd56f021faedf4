/**
 * Byte source implementations
 * In-memory buffers and files read with positional reads
 */

import { closeSync, existsSync, fstatSync, openSync, readSync } from 'node:fs'
import type { ByteSource, ClosableByteSource } from './types'

/**
 * Byte source over an in-memory buffer
 */
export class BufferSource implements ByteSource {
	private offset = 0

	constructor(private readonly data: Uint8Array) {}

	get position(): number {
		return this.offset
	}

	get size(): number {
		return this.data.length
	}

	seek(offset: number): void {
		this.offset = checkOffset(offset)
	}

	read(length: number): Uint8Array {
		const start = Math.min(this.offset, this.data.length)
		const end = Math.min(start + Math.max(0, length), this.data.length)
		this.offset = end
		return this.data.subarray(start, end)
	}
}

/**
 * Byte source over a file on disk
 * Reads are synchronous; call close() when done
 */
export class FileSource implements ClosableByteSource {
	private readonly fd: number
	private readonly length: number
	private offset = 0
	private closed = false

	constructor(readonly path: string) {
		if (!existsSync(path)) {
			throw new Error(`File not found: ${path}`)
		}
		this.fd = openSync(path, 'r')
		this.length = fstatSync(this.fd).size
	}

	get position(): number {
		return this.offset
	}

	get size(): number {
		return this.length
	}

	seek(offset: number): void {
		this.offset = checkOffset(offset)
	}

	read(length: number): Uint8Array {
		if (this.closed) {
			throw new Error(`File source already closed: ${this.path}`)
		}

		const wanted = Math.max(0, Math.min(length, this.length - this.offset))
		if (wanted === 0) return new Uint8Array(0)

		const buffer = new Uint8Array(wanted)
		let filled = 0
		while (filled < wanted) {
			const count = readSync(this.fd, buffer, filled, wanted - filled, this.offset + filled)
			if (count === 0) break
			filled += count
		}

		this.offset += filled
		return filled === wanted ? buffer : buffer.subarray(0, filled)
	}

	close(): void {
		if (this.closed) return
		this.closed = true
		closeSync(this.fd)
	}
}

function checkOffset(offset: number): number {
	if (!Number.isInteger(offset) || offset < 0) {
		throw new Error(`Invalid seek offset: ${offset}`)
	}
	return offset
}
