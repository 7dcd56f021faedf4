import type { ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<Exclude<ImageFormat, 'tiff'> | 'tiff_le' | 'tiff_be', { bytes: number[]; offset?: number }> = {
	jpeg: { bytes: [0xff, 0xd8, 0xff] },
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	gif: { bytes: [0x47, 0x49, 0x46, 0x38] }, // "GIF8"
	bmp: { bytes: [0x42, 0x4d] }, // "BM"
	webp: { bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }, // "WEBP" after the RIFF header
	psd: { bytes: [0x38, 0x42, 0x50, 0x53] }, // "8BPS"
	tiff_le: { bytes: [0x49, 0x49, 0x2a, 0x00] }, // Little endian
	tiff_be: { bytes: [0x4d, 0x4d, 0x00, 0x2a] }, // Big endian
}

const RIFF = [0x52, 0x49, 0x46, 0x46]

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	return magic.bytes.every((expected, i) => data[offset + i] === expected)
}

/**
 * Detect container format from the leading bytes of a file
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.jpeg)) return 'jpeg'
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.gif)) return 'gif'
	if (matchMagic(data, MAGIC_BYTES.psd)) return 'psd'
	if (matchMagic(data, MAGIC_BYTES.tiff_le) || matchMagic(data, MAGIC_BYTES.tiff_be)) return 'tiff'
	if (matchMagic(data, { bytes: RIFF }) && matchMagic(data, MAGIC_BYTES.webp)) return 'webp'
	if (matchMagic(data, MAGIC_BYTES.bmp)) return 'bmp'

	return null
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	if (format === 'psd') return 'image/vnd.adobe.photoshop'
	return `image/${format}`
}
