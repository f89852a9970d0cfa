import createDebug from 'debug';
import { asciiBytes, percentDecode } from './codec';
import { ParseError } from './errors';
import { Result, err, ok } from './result';
import type { DataUrlInit, DataUrlParameter } from './data-url';

const debug = createDebug('data-url:parser');

export type ParseInput = string | URL | null | undefined;

/**
 * Splits a "data:" URL into its content type, base64 flag, parameters
 * and raw payload. Never throws for a `ParseError` condition; those come
 * back as the `err` side of the result.
 */
export function parseDataUrlInit(
	input: ParseInput
): Result<DataUrlInit, ParseError> {
	if (input === null || input === undefined) {
		debug('Rejecting absent input');
		return err(new ParseError(input, 'Can not parse a missing data URL'));
	}
	const uri = String(input);
	debug('parse(%o)', uri);

	if (uri.substring(0, 5).toLowerCase() !== 'data:') {
		debug('Missing "data:" prefix');
		return err(new ParseError(uri, 'Data URL does not begin with "data:"'));
	}

	// split the URI up into the "specification" and the "payload" portions
	const rest = uri.substring(5);
	const firstComma = rest.indexOf(',');
	if (firstComma === -1) {
		debug('No comma separating specification and payload');
		return err(new ParseError(uri, 'Missing comma sign'));
	}
	const specification = rest.substring(0, firstComma);
	const payload = rest.substring(firstComma + 1);

	const [contentType, ...items] = specification.split(';');

	let isBase64Encoded = false;
	const parameters: DataUrlParameter[] = [];
	for (const item of items) {
		const eq = item.indexOf('=');
		const key = (eq === -1 ? item : item.substring(0, eq)).trim();
		const value = eq === -1 ? '' : item.substring(eq + 1).trim();

		// matched before decoding: `%62ase64` is a parameter, not the flag
		if (key.toLowerCase() === 'base64') {
			debug('Found "base64" flag');
			isBase64Encoded = true;
			continue;
		}

		const parameter = Object.freeze({
			key: percentDecode(key),
			value: percentDecode(value),
		});
		debug('Parameter %o', parameter);
		parameters.push(parameter);
	}

	return ok({
		content: asciiBytes(payload),
		contentType,
		isBase64Encoded,
		parameters,
	});
}
