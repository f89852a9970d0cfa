/**
 * Error thrown when a string can not be parsed as a "data:" URL.
 */
export class ParseError extends Error {
	code = 'ERR_INVALID_DATA_URL';
	input: string | null | undefined;
	reason: string;

	constructor(input: string | null | undefined, reason: string) {
		super(`${reason} (dataUrl="${input}")`);
		this.name = 'ParseError';
		this.input = input;
		this.reason = reason;
	}
}

/**
 * Error thrown when content flagged as base64 turns out not to be
 * valid base64 text. Only raised when the content is read.
 */
export class DecodeError extends Error {
	code = 'ERR_INVALID_BASE64';
	input: string;

	constructor(input: string, message?: string) {
		super(message || `Content is not valid base64: "${input}"`);
		this.name = 'DecodeError';
		this.input = input;
	}
}
