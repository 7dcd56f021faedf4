/**
 * @iimkit/core
 *
 * Byte sources and container detection shared by the metadata readers
 */

export type { ByteSource, ClosableByteSource, ImageFormat } from './types'
export { BufferSource, FileSource } from './source'
export { detectFormat, getMimeType } from './format'
