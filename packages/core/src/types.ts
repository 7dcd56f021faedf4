/**
 * Seekable byte source with a read cursor
 * Owned by the caller; readers only move the cursor and read
 */
export interface ByteSource {
	/** Current cursor position in bytes */
	readonly position: number
	/** Total length in bytes, when known */
	readonly size?: number
	/** Move the cursor to an absolute offset */
	seek(offset: number): void
	/**
	 * Read up to `length` bytes from the cursor and advance past them.
	 * Returns fewer bytes (possibly none) once the source is exhausted.
	 */
	read(length: number): Uint8Array
}

/**
 * Byte source holding an open resource
 */
export interface ClosableByteSource extends ByteSource {
	close(): void
}

/**
 * Container formats recognised by magic bytes
 */
export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'tiff' | 'bmp' | 'webp' | 'psd'
