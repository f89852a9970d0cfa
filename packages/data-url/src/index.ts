import { DataUrl } from './data-url';
import type { ParseInput } from './parser';

export { DataUrl } from './data-url';
export type { DataUrlParameter, DataUrlParameterInput } from './data-url';
export { DEFAULT_ENCODING } from './codec';
export type { TextEncoding } from './codec';
export { DecodeError, ParseError } from './errors';
export { isErr, isOk } from './result';
export type { Result } from './result';
export type { ParseInput } from './parser';

/**
 * Parses an RFC 2397 "data:" URL string.
 *
 * @throws {ParseError} when the `data:` prefix or the comma is missing
 */
export const parseDataUrl = (input: ParseInput) => DataUrl.parse(input);

export const safeParseDataUrl = (input: ParseInput) => DataUrl.safeParse(input);

/**
 * Returns `undefined` instead of throwing for input that is not a
 * "data:" URL.
 */
export const tryParseDataUrl = (input: ParseInput) => DataUrl.tryParse(input);
