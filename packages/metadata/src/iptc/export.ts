/**
 * XML and SQL export of decoded IPTC attributes
 */

import { ownValue } from './metadata'
import type { IptcMetadata } from './types'

export interface XmlExportOptions {
	/** Root element name (default 'photo') */
	entity?: string
	/** Extra elements written before the IPTC data; keys must be valid tag names */
	extra?: Record<string, string>
}

/**
 * Export metadata as XML.
 * Attribute names become tags: spaces turn into underscores, slashes into dashes.
 */
export function exportXml(metadata: IptcMetadata, options: XmlExportOptions = {}): string {
	const entity = options.entity || 'photo'
	const extra = options.extra ?? {}
	const lines: string[] = [`<${entity}>`]

	for (const [key, value] of Object.entries(extra)) {
		lines.push(`\t<${key}>${escapeXml(value)}</${key}>`)
	}

	for (const [name, value] of Object.entries(metadata.scalars)) {
		const tag = toXmlTag(name)
		lines.push(`\t<${tag}>${escapeXml(value)}</${tag}>`)
	}

	const keywords = ownValue(metadata.lists, 'keywords')
	if (keywords) {
		lines.push('\t<keywords>')
		for (const keyword of keywords) {
			lines.push(`\t\t<keyword>${escapeXml(keyword)}</keyword>`)
		}
		lines.push('\t</keywords>')
	}

	const categories = ownValue(metadata.lists, 'supplemental category')
	if (categories) {
		lines.push('\t<supplemental_categories>')
		for (const category of categories) {
			lines.push(`\t\t<supplemental_category>${escapeXml(category)}</supplemental_category>`)
		}
		lines.push('\t</supplemental_categories>')
	}

	lines.push(`</${entity}>`)
	return `${lines.join('\n')}\n`
}

/**
 * Build an INSERT statement from mapped attributes.
 * `mappings` maps attribute names to column names; extra columns come first.
 */
export function exportSql(
	metadata: IptcMetadata,
	table: string,
	mappings: Record<string, string>,
	extra: Record<string, string> = {}
): string {
	const columns: string[] = []
	const values: string[] = []

	for (const [column, value] of Object.entries(extra)) {
		columns.push(column)
		values.push(quoteSql(value))
	}

	for (const [attribute, column] of Object.entries(mappings)) {
		columns.push(column)
		values.push(quoteSql(ownValue(metadata.scalars, attribute) ?? ''))
	}

	return `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${values.join(', ')})`
}

/**
 * Attribute name to XML tag name
 */
export function toXmlTag(name: string): string {
	return name.replace(/ /g, '_').replace(/\//g, '-')
}

function escapeXml(text: string): string {
	return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

function quoteSql(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}
