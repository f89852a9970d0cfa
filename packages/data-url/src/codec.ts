import * as querystring from 'querystring';
import { DecodeError } from './errors';

/**
 * Text encodings that `Buffer` can convert strings to and from.
 */
export type TextEncoding = Exclude<BufferEncoding, 'base64' | 'base64url' | 'hex'>;

export const DEFAULT_ENCODING: TextEncoding = 'utf8';

// Lookup table for validating base64 characters (-1 means "not in the alphabet")
const base64Lookup: number[] = new Array(256).fill(-1);
const base64Chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
for (let i = 0; i < base64Chars.length; i++) {
	base64Lookup[base64Chars.charCodeAt(i)] = i;
}

function toBuffer(bytes: Uint8Array): Buffer {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function base64Encode(bytes: Uint8Array): string {
	return toBuffer(bytes).toString('base64');
}

/**
 * Decodes standard, padded base64. Whitespace is ignored; anything
 * else outside the alphabet throws a `DecodeError`.
 */
export function base64Decode(text: string): Buffer {
	const base64 = text.replace(/[\t\n\r ]/g, '');
	const len = base64.length;
	if (len % 4 !== 0) {
		throw new DecodeError(text, `Invalid base64 length ${len}: "${text}"`);
	}

	let padding = 0;
	while (padding < len && base64.charCodeAt(len - 1 - padding) === 61) {
		padding++;
	}
	if (padding > 2) {
		throw new DecodeError(text, `Too much base64 padding: "${text}"`);
	}

	for (let i = 0; i < len - padding; i++) {
		const code = base64.charCodeAt(i);
		if (code > 255 || base64Lookup[code] === -1) {
			throw new DecodeError(
				text,
				`Invalid base64 character "${base64.charAt(i)}" at offset ${i}: "${text}"`
			);
		}
	}

	return Buffer.from(base64, 'base64');
}

// Bytes `percentEncode()` leaves as they are: A-Z a-z 0-9 - _ . ! * ( )
const unreservedChars =
	'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_.!*()';
const unreserved = new Set(
	Array.from(unreservedChars, (c) => c.charCodeAt(0))
);

/**
 * Form-style percent-encoding: spaces become `+`, and every UTF-8 byte
 * outside the unreserved set becomes `%XX`. Lone surrogates are encoded
 * as U+FFFD.
 */
export function percentEncode(text: string): string {
	let encoded = '';
	for (const byte of Buffer.from(text, 'utf8')) {
		if (unreserved.has(byte)) {
			encoded += String.fromCharCode(byte);
		} else if (byte === 32) {
			encoded += '+';
		} else {
			encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
		}
	}
	return encoded;
}

/**
 * Inverse of `percentEncode()`. Malformed escapes are kept as they are.
 */
export function percentDecode(text: string): string {
	return querystring.unescape(text.replace(/\+/g, ' '));
}

export function textEncode(text: string, encoding: TextEncoding): Buffer {
	return Buffer.from(text, encoding);
}

export function textDecode(bytes: Uint8Array, encoding: TextEncoding): string {
	return toBuffer(bytes).toString(encoding);
}

/**
 * One byte per character. `latin1` rather than `ascii` so that
 * `asciiString(asciiBytes(s)) === s` for every character up to U+00FF.
 * Characters above U+00FF become `?`.
 */
export function asciiBytes(text: string): Buffer {
	const narrowed = text.replace(
		/[\uD800-\uDBFF][\uDC00-\uDFFF]|[^\u0000-\u00FF]/g,
		'?'
	);
	return Buffer.from(narrowed, 'latin1');
}

export function asciiString(bytes: Uint8Array): string {
	return toBuffer(bytes).toString('latin1');
}
