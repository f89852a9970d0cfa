import createDebug from 'debug';
import {
	DEFAULT_ENCODING,
	TextEncoding,
	asciiBytes,
	asciiString,
	base64Decode,
	base64Encode,
	percentEncode,
	textDecode,
	textEncode,
} from './codec';
import { ParseError } from './errors';
import { ParseInput, parseDataUrlInit } from './parser';
import { Result, err, ok } from './result';

const debug = createDebug('data-url');

export interface DataUrlParameter {
	readonly key: string;
	readonly value: string;
}

export type DataUrlParameterInput =
	| DataUrlParameter
	| readonly [key: string, value: string];

export interface DataUrlInit {
	content: Uint8Array;
	contentType: string;
	isBase64Encoded: boolean;
	parameters?: Iterable<DataUrlParameterInput>;
}

function toParameter(input: DataUrlParameterInput): DataUrlParameter {
	if (isParameterTuple(input)) {
		return Object.freeze({ key: input[0], value: input[1] });
	}
	return Object.freeze({ key: input.key, value: input.value });
}

function isParameterTuple(
	input: DataUrlParameterInput
): input is readonly [string, string] {
	return Array.isArray(input);
}

/**
 * Immutable value object for a "data:" URL (RFC 2397).
 *
 * Every factory stores its content as base64 text. Only a parsed URL
 * without the `;base64` flag keeps its payload as literal bytes.
 */
export class DataUrl {
	readonly contentType: string;
	readonly isBase64Encoded: boolean;
	readonly parameters: ReadonlyArray<DataUrlParameter>;
	private readonly bytes: Buffer;

	private constructor({
		content,
		contentType,
		isBase64Encoded,
		parameters = [],
	}: DataUrlInit) {
		this.bytes = Buffer.from(content);
		this.contentType = contentType;
		this.isBase64Encoded = isBase64Encoded;
		this.parameters = Object.freeze(Array.from(parameters, toParameter));
		Object.freeze(this);
	}

	/**
	 * Encodes `content` with `encoding` and embeds the resulting bytes.
	 */
	static fromString(
		content: string,
		contentType: string,
		parameters?: Iterable<DataUrlParameterInput>,
		encoding: TextEncoding = DEFAULT_ENCODING
	): DataUrl {
		debug('fromString(%o, %o)', contentType, encoding);
		return DataUrl.fromBytes(
			textEncode(content, encoding),
			contentType,
			parameters
		);
	}

	static fromBytes(
		content: Uint8Array | ArrayBufferLike,
		contentType: string,
		parameters?: Iterable<DataUrlParameterInput>
	): DataUrl {
		const bytes =
			content instanceof Uint8Array ? content : new Uint8Array(content);
		debug('fromBytes(%o bytes, %o)', bytes.byteLength, contentType);
		return new DataUrl({
			content: asciiBytes(base64Encode(bytes)),
			contentType,
			isBase64Encoded: true,
			parameters,
		});
	}

	/**
	 * Embeds already base64 encoded text as is. The text is not
	 * validated here; invalid base64 surfaces as a `DecodeError` on read.
	 */
	static fromBase64String(
		base64: string,
		contentType: string,
		parameters?: Iterable<DataUrlParameterInput>
	): DataUrl {
		debug('fromBase64String(%o)', contentType);
		return new DataUrl({
			content: asciiBytes(base64),
			contentType,
			isBase64Encoded: true,
			parameters,
		});
	}

	static safeParse(input: ParseInput): Result<DataUrl, ParseError> {
		const result = parseDataUrlInit(input);
		if (!result.ok) {
			return err(result.error);
		}
		return ok(new DataUrl(result.value));
	}

	/**
	 * @throws {ParseError} if `input` is not a "data:" URL
	 */
	static parse(input: ParseInput): DataUrl {
		const result = DataUrl.safeParse(input);
		if (!result.ok) {
			throw result.error;
		}
		return result.value;
	}

	/**
	 * Like `parse()`, but returns `undefined` instead of throwing.
	 */
	static tryParse(input: ParseInput): DataUrl | undefined {
		try {
			return DataUrl.parse(input);
		} catch (e: unknown) {
			debug('tryParse() failed: %s', e);
			return undefined;
		}
	}

	/**
	 * The stored bytes: base64 text when `isBase64Encoded`, the literal
	 * payload otherwise. Returns a copy.
	 */
	get content(): Buffer {
		return Buffer.from(this.bytes);
	}

	get charset(): string | undefined {
		const param = this.parameters.find(
			(p) => p.key.toLowerCase() === 'charset'
		);
		return param?.value;
	}

	getParameter(key: string): string | undefined {
		return this.parameters.find((p) => p.key === key)?.value;
	}

	getParameters(key: string): string[] {
		return this.parameters.filter((p) => p.key === key).map((p) => p.value);
	}

	/**
	 * @throws {DecodeError} if the content is flagged as base64 but is not
	 */
	readAsBytes(): Buffer {
		if (this.isBase64Encoded) {
			return base64Decode(asciiString(this.bytes));
		}
		return Buffer.from(this.bytes);
	}

	readAsString(encoding: TextEncoding = DEFAULT_ENCODING): string {
		return textDecode(this.readAsBytes(), encoding);
	}

	readAsBase64EncodedString(): string {
		if (this.isBase64Encoded) {
			return asciiString(this.bytes);
		}
		return base64Encode(this.bytes);
	}

	equals(other: DataUrl): boolean {
		return (
			this.contentType === other.contentType &&
			this.isBase64Encoded === other.isBase64Encoded &&
			this.bytes.equals(other.bytes) &&
			this.parameters.length === other.parameters.length &&
			this.parameters.every(
				(p, i) =>
					p.key === other.parameters[i].key &&
					p.value === other.parameters[i].value
			)
		);
	}

	toString(): string {
		let str = `data:${this.contentType}`;
		if (this.isBase64Encoded) {
			str += ';base64';
		}
		for (const { key, value } of this.parameters) {
			str += `;${percentEncode(key)}=${percentEncode(value)}`;
		}
		return `${str},${asciiString(this.bytes)}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
