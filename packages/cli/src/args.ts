import type { IptcEncoding } from '@iimkit/metadata'

export interface CliOptions {
	// Output
	xml?: boolean
	entity?: string
	sql?: string
	map: Record<string, string>
	extra: Record<string, string>
	out?: string

	// Decoding
	maxOffset?: number
	encoding?: IptcEncoding

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	inputs: string[]
	options: CliOptions
}

const FLAGS = new Set([
	'--help',
	'-?',
	'--version',
	'-V',
	'--verbose',
	'-v',
	'--quiet',
	'--xml',
	'--entity',
	'-e',
	'--sql',
	'--map',
	'-m',
	'--extra',
	'-x',
	'--out',
	'-o',
	'--max-offset',
	'--encoding',
])

/**
 * Parse command line arguments.
 * Throws on unknown options and malformed values.
 */
export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = { map: {}, extra: {} }

	let i = 0
	const value = (flag: string): string => {
		const next = args[i + 1]
		// Values may start with '-'; only a known flag counts as missing
		if (next === undefined || FLAGS.has(next)) {
			throw new Error(`Missing value for ${flag}`)
		}
		i++
		return next
	}

	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--xml') {
			options.xml = true
		} else if (arg === '--entity' || arg === '-e') {
			options.entity = value(arg)
		} else if (arg === '--sql') {
			options.sql = value(arg)
		} else if (arg === '--map' || arg === '-m') {
			const [attribute, column] = splitPair(arg, value(arg))
			options.map[attribute] = column
		} else if (arg === '--extra' || arg === '-x') {
			const [key, extraValue] = splitPair(arg, value(arg))
			options.extra[key] = extraValue
		} else if (arg === '--out' || arg === '-o') {
			options.out = value(arg)
		} else if (arg === '--max-offset') {
			options.maxOffset = parseOffset(value(arg))
		} else if (arg === '--encoding') {
			options.encoding = parseEncoding(value(arg))
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	if (options.xml && options.sql !== undefined) {
		throw new Error('--xml and --sql cannot be combined')
	}

	return { inputs, options }
}

function splitPair(flag: string, text: string): [string, string] {
	const eq = text.indexOf('=')
	if (eq <= 0) {
		throw new Error(`Expected <name>=<value> for ${flag}, got: ${text}`)
	}
	return [text.slice(0, eq), text.slice(eq + 1)]
}

function parseOffset(text: string): number {
	const offset = Number(text)
	if (!/^\d+$/.test(text) || !Number.isSafeInteger(offset)) {
		throw new Error(`Invalid max offset: ${text}`)
	}
	return offset
}

function parseEncoding(text: string): IptcEncoding {
	const normalized = text.toLowerCase()
	if (normalized === 'latin1') return 'latin1'
	if (normalized === 'utf-8' || normalized === 'utf8') return 'utf-8'
	throw new Error(`Unsupported encoding: ${text}`)
}
