// src/dyson/json-extract.ts
// Parse the first complete JSON value at the start of a text and ignore the
// rest. Some device families (robot vacuums on lecAndWifi) append more JSON or
// stray bytes after the credential document, so JSON.parse on the whole text
// fails with trailing data.

export interface ExtractedJson {
	value: unknown;
	/** Offset just past the extracted value. */
	end: number;
	/** Whatever followed the value (whitespace excluded). */
	trailing: string;
}

export class JsonExtractError extends Error {
	constructor(message: string, public readonly offset: number) {
		super(message);
		this.name = 'JsonExtractError';
	}
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const LITERAL_PATTERN = /^(?:-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null)/;

function skipWhitespace(text: string, from: number): number {
	let i = from;
	while (i < text.length && WHITESPACE.has(text[i])) {
		i += 1;
	}
	return i;
}

/** Index just past the closing quote of the string starting at `start`. */
function scanString(text: string, start: number): number {
	let i = start + 1;
	while (i < text.length) {
		const ch = text[i];
		if (ch === '\\') {
			i += 2;
			continue;
		}
		if (ch === '"') {
			return i + 1;
		}
		i += 1;
	}
	throw new JsonExtractError('Unterminated string in JSON value', start);
}

/** Index just past the bracket that closes the container opened at `start`. */
function scanContainer(text: string, start: number): number {
	const stack: string[] = [];
	let i = start;
	while (i < text.length) {
		const ch = text[i];
		if (ch === '"') {
			i = scanString(text, i);
			continue;
		}
		if (ch === '{') {
			stack.push('}');
		} else if (ch === '[') {
			stack.push(']');
		} else if (ch === '}' || ch === ']') {
			if (stack.pop() !== ch) {
				throw new JsonExtractError(`Unbalanced "${ch}" in JSON value`, i);
			}
			if (stack.length === 0) {
				return i + 1;
			}
		}
		i += 1;
	}
	throw new JsonExtractError('JSON value is not closed before the end of the text', start);
}

/**
 * Locate and parse the first JSON value in `text`. Only the located slice is
 * handed to JSON.parse, so malformed content inside the value still fails.
 */
export function extractFirstJsonValue(text: string): ExtractedJson {
	const start = skipWhitespace(text, 0);
	if (start >= text.length) {
		throw new JsonExtractError('No JSON value found', start);
	}

	const first = text[start];
	let end: number;
	if (first === '{' || first === '[') {
		end = scanContainer(text, start);
	} else if (first === '"') {
		end = scanString(text, start);
	} else {
		const match = LITERAL_PATTERN.exec(text.slice(start));
		if (!match) {
			throw new JsonExtractError(`Unexpected character ${JSON.stringify(first)} at start of JSON value`, start);
		}
		end = start + match[0].length;
	}

	let value: unknown;
	try {
		value = JSON.parse(text.slice(start, end));
	} catch (err) {
		throw new JsonExtractError(
			`Invalid JSON value: ${err instanceof Error ? err.message : String(err)}`,
			start,
		);
	}

	return { value, end, trailing: text.slice(end).trim() };
}
