/**
 * Helpers for decoded attribute records
 */

import type { IptcMetadata } from './types'

/**
 * Empty metadata with prototype-free records, so any attribute name is an own key
 */
export function createMetadata(): IptcMetadata {
	const scalars: Record<string, string> = Object.create(null)
	const lists: Record<string, string[]> = Object.create(null)
	return { scalars, lists }
}

/**
 * Own property of a record, ignoring anything inherited from Object.prototype
 */
export function ownValue<T>(record: Record<string, T>, name: string): T | undefined {
	return Object.hasOwn(record, name) ? record[name] : undefined
}
