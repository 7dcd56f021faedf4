import { writeFileSync } from 'node:fs'
import { detectFormat, FileSource, getMimeType } from '@iimkit/core'
import { exportSql, exportXml, type IptcInfo, readIptc } from '@iimkit/metadata'
import { type CliOptions, type ParsedArgs, parseArgs } from './args'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const HELP = `
iimkit - IPTC metadata reader

USAGE:
  iimkit <file...>                     Print IPTC attributes
  iimkit <file...> --xml               Export as XML
  iimkit <file> --sql <table> -m a=c   Export an INSERT statement

OPTIONS:
  --xml                     XML output
  -e, --entity <name>       XML root element (default: photo)
  --sql <table>             SQL output into <table>
  -m, --map <attr>=<col>    Map an IPTC attribute to a column (repeatable)
  -x, --extra <key>=<val>   Extra XML element or SQL column (repeatable)
  -o, --out <file>          Write output to a file
  --max-offset <bytes>      Scan window for the first IPTC tag (default: 512)
  --encoding <name>         Value encoding: latin1 (default) or utf-8
  -v, --verbose             Diagnostic output on stderr
  --quiet                   Suppress messages
  --help                    Show this help
  --version                 Show version

EXAMPLES:
  iimkit photo.jpg
  iimkit photo.jpg --xml -e image -x file=photo.jpg
  iimkit photo.jpg --sql photos -m caption/abstract=caption -m city=city
`

/** Bytes read for container detection */
const FORMAT_HEADER_SIZE = 16

export interface CliIo {
	log(message: string): void
	error(message: string): void
}

const consoleIo: CliIo = {
	log: (message) => console.log(message),
	error: (message) => console.error(message),
}

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

function formatText(info: IptcInfo): string {
	const lines: string[] = []

	for (const [name, value] of Object.entries(info.metadata.scalars)) {
		lines.push(`${name}: ${value}`)
	}
	for (const [name, values] of Object.entries(info.metadata.lists)) {
		lines.push(`${name}: ${values.join(', ')}`)
	}

	return lines.map((line) => `${line}\n`).join('')
}

function formatInfo(info: IptcInfo, options: CliOptions): string {
	if (options.xml) {
		return exportXml(info.metadata, { entity: options.entity, extra: options.extra })
	}
	if (options.sql !== undefined) {
		return `${exportSql(info.metadata, options.sql, options.map, options.extra)};\n`
	}
	return formatText(info)
}

// ─────────────────────────────────────────────────────────────────────────────
// File Reading
// ─────────────────────────────────────────────────────────────────────────────

function readFile(path: string, options: CliOptions, io: CliIo): IptcInfo | null {
	const debug = (message: string) => {
		if (options.verbose && !options.quiet) io.error(`**IPTC** ${message}`)
	}

	const source = new FileSource(path)
	try {
		debug(`Reading ${path} (${source.size} bytes)`)

		const format = detectFormat(source.read(FORMAT_HEADER_SIZE))
		debug(format ? `Format: ${format} (${getMimeType(format)})` : 'Format: unknown')

		const info = readIptc(source, {
			maxOffset: options.maxOffset,
			encoding: options.encoding,
		})
		if (!info) {
			debug('No IPTC data found')
			return null
		}

		debug(`Found record 2 at offset ${info.offset}`)
		if (info.discarded.length > 0) {
			debug(`Discarded datasets: ${info.discarded.join(', ')}`)
		}
		debug(`Stopped: ${info.stopReason}`)

		return info
	} finally {
		source.close()
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return the exit code
 */
export function run(args: string[], io: CliIo = consoleIo): number {
	let parsed: ParsedArgs
	try {
		parsed = parseArgs(args)
	} catch (err) {
		io.error(`Error: ${errorMessage(err)}`)
		return 1
	}
	const { inputs, options } = parsed

	if (options.help) {
		io.log(HELP)
		return 0
	}

	if (options.version) {
		io.log(`iimkit v${VERSION}`)
		return 0
	}

	if (inputs.length === 0) {
		io.error('Error: No input files specified')
		return 1
	}

	if (options.sql !== undefined && Object.keys(options.map).length === 0) {
		io.error('Error: --sql requires at least one --map <attribute>=<column>')
		return 1
	}

	const chunks: string[] = []
	let failed = 0

	for (const input of inputs) {
		try {
			const info = readFile(input, options, io)
			if (!info) {
				if (!options.quiet) io.error(`${input}: no IPTC data found`)
				continue
			}

			if (inputs.length > 1 && !options.xml && options.sql === undefined) {
				chunks.push(`==> ${input} <==\n`)
			}
			chunks.push(formatInfo(info, options))
		} catch (err) {
			failed++
			if (!options.quiet) io.error(`Error: ${errorMessage(err)}`)
		}
	}

	const output = chunks.join('')

	if (options.out) {
		try {
			writeFileSync(options.out, output)
		} catch (err) {
			io.error(`Error: ${errorMessage(err)}`)
			return 1
		}
		if (options.verbose && !options.quiet) {
			io.error(`**IPTC** Wrote ${options.out}`)
		}
	} else if (output.length > 0) {
		io.log(output.replace(/\n$/, ''))
	}

	return failed > 0 ? 1 : 0
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
