/**
 * Request Encoder
 *
 * Builds the `tfs` query token the flight results page decodes into a one-way
 * search. The page expects a protobuf-like byte layout:
 *
 *   PREFIX | date | ORIGIN_TAG | origin | DESTINATION_TAG | destination | SUFFIX
 *
 * base64-encoded, with a run of seven underscores spliced in six characters
 * before the end of the encoded string.
 */

import type { SearchRequest } from '../types/flights.js';

export const DEFAULT_FLIGHTS_BASE_URL = 'https://www.google.com/travel/flights/search';

const PREFIX = Uint8Array.from([0x08, 0x1c, 0x10, 0x02, 0x1a, 0x1e, 0x12, 0x0a]);
const ORIGIN_TAG = Uint8Array.from([0x6a, 0x07, 0x08, 0x01, 0x12, 0x03]);
const DESTINATION_TAG = Uint8Array.from([0x72, 0x07, 0x08, 0x01, 0x12, 0x03]);
const SUFFIX = Uint8Array.from([
  0x40, 0x01, 0x48, 0x01, 0x70, 0x01, 0x82, 0x01, 0x0b, 0x08, 0xfc, 0x06, 0x60, 0x04, 0x08,
]);

export const PADDING_MARKER = '_______';

/** Distance from the end of the base64 string at which the marker goes */
const MARKER_OFFSET_FROM_END = 6;

/**
 * Raw bytes of a one-way search, before base64
 */
export function encodeSearchBytes(origin: string, destination: string, date: string): Buffer {
  return Buffer.concat([
    PREFIX,
    Buffer.from(date, 'utf-8'),
    ORIGIN_TAG,
    Buffer.from(origin, 'utf-8'),
    DESTINATION_TAG,
    Buffer.from(destination, 'utf-8'),
    SUFFIX,
  ]);
}

/**
 * Encode (origin, destination, date) into the results-page token.
 * Deterministic; performs no validation.
 */
export function encode(origin: string, destination: string, date: string): string {
  const b64 = encodeSearchBytes(origin, destination, date).toString('base64');
  const insertAt = b64.length - MARKER_OFFSET_FROM_END;
  return b64.slice(0, insertAt) + PADDING_MARKER + b64.slice(insertAt);
}

export function encodeRequest(request: SearchRequest): string {
  return encode(request.origin, request.destination, request.date);
}

/**
 * Reverse of encode(): strip the marker and base64-decode
 */
export function decodeToken(token: string): Buffer {
  const markerAt = token.length - MARKER_OFFSET_FROM_END - PADDING_MARKER.length;
  const stripped = token.slice(markerAt, markerAt + PADDING_MARKER.length) === PADDING_MARKER
    ? token.slice(0, markerAt) + token.slice(markerAt + PADDING_MARKER.length)
    : token;
  return Buffer.from(stripped, 'base64');
}

/**
 * Results-page URL for an already encoded token
 */
export function buildResultsUrl(token: string, baseUrl: string = DEFAULT_FLIGHTS_BASE_URL): string {
  return `${baseUrl}?tfs=${token}`;
}

export function buildSearchUrl(
  origin: string,
  destination: string,
  date: string,
  baseUrl: string = DEFAULT_FLIGHTS_BASE_URL
): string {
  return buildResultsUrl(encode(origin, destination, date), baseUrl);
}
