import * as iconv from 'iconv-lite';
import { EncodingAppError } from '../errors';

const ENCODING = 'Shift_JIS';
const REPLACEMENT_CHAR = '�';

function roundTrips(text: string): boolean {
  return iconv.decode(iconv.encode(text, ENCODING), ENCODING) === text;
}

function describeChar(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  const hex = codePoint.toString(16).toUpperCase().padStart(4, '0');
  return `"${char}" (U+${hex})`;
}

/**
 * Encodes text as Shift_JIS. iconv-lite substitutes unmappable characters,
 * so the result is checked by decoding it back.
 */
export function encodeShiftJis(text: string): Buffer {
  const encoded = iconv.encode(text, ENCODING);
  if (iconv.decode(encoded, ENCODING) === text) {
    return encoded;
  }

  const unmappable = Array.from(text).find((char) => !roundTrips(char));
  const what = unmappable ? describeChar(unmappable) : 'text';
  throw new EncodingAppError(`Cannot encode ${what} in ${ENCODING}`);
}

/**
 * Decodes Shift_JIS bytes. With `strict: false` invalid sequences become
 * U+FFFD instead of failing; use it only for text shown in error messages.
 */
export function decodeShiftJis(
  bytes: Buffer,
  { strict = true }: { strict?: boolean } = {},
): string {
  const text = iconv.decode(bytes, ENCODING);
  if (strict && text.includes(REPLACEMENT_CHAR)) {
    throw new EncodingAppError(`Bytes are not valid ${ENCODING}`);
  }
  return text;
}

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x2a || // *
    byte === 0x2d || // -
    byte === 0x2e || // .
    byte === 0x5f // _
  );
}

function percentEncode(bytes: Buffer): string {
  let out = '';
  bytes.forEach((byte) => {
    if (isUnreserved(byte)) {
      out += String.fromCharCode(byte);
    } else if (byte === 0x20) {
      out += '+';
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  });
  return out;
}

function percentDecode(text: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    const hex = text.substring(i + 1, i + 3);
    if (char === '+') {
      bytes.push(0x20);
    } else if (char === '%' && /^[0-9a-fA-F]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      const code = char.charCodeAt(0);
      if (code > 0x7f) {
        throw new EncodingAppError(
          `Form body contains raw non-ASCII ${describeChar(char)}`,
        );
      }
      bytes.push(code);
    }
  }
  return Buffer.from(bytes);
}

/**
 * Serializes fields as `application/x-www-form-urlencoded` over Shift_JIS
 * bytes, keeping insertion order. The result is plain ASCII.
 */
export function encodeForm(
  fields: Iterable<readonly [string, string]>,
): string {
  const pairs: string[] = [];
  for (const [key, value] of fields) {
    const encodedKey = percentEncode(encodeShiftJis(key));
    const encodedValue = percentEncode(encodeShiftJis(value));
    pairs.push(`${encodedKey}=${encodedValue}`);
  }
  return pairs.join('&');
}

export function decodeForm(body: string): URLSearchParams {
  const params = new URLSearchParams();
  body
    .split('&')
    .filter((pair) => pair.length > 0)
    .forEach((pair) => {
      const separator = pair.indexOf('=');
      const key = separator === -1 ? pair : pair.substring(0, separator);
      const value = separator === -1 ? '' : pair.substring(separator + 1);
      params.append(
        decodeShiftJis(percentDecode(key)),
        decodeShiftJis(percentDecode(value)),
      );
    });
  return params;
}
