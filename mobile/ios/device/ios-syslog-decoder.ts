import { TextDecoder } from "util";

const BACKSLASH = 0x5c;
const M = 0x4d;
const DASH = 0x2d;
const CARET = 0x5e;
const DIGIT_MASK = 0xf0;
const DIGITS = 0x30;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function isDigit(byte: number): boolean {
	return (byte & DIGIT_MASK) === DIGITS;
}

function decodeOctal(x: number, y: number, z: number): number {
	return (x & 0x3) << 6 | (y & 0x7) << 3 | (z & 0x7);
}

/**
 * Decodes a vis-encoded line of the iOS system log.
 * The system log is 7-bit safe, bytes outside of the printable range are written as:
 * `\M^x` for 0x80 to 0x9f, `\M-x` for 0xa0 to 0xf7 and `\ddd` (octal) for backslash and 0xa0.
 * In case the result is not valid UTF-8, the line is returned as is.
 * @param {string} line A line read from the system log.
 * @returns {string} The decoded line.
 */
export function decodeSyslog(line: string): string {
	try {
		const bytes = Buffer.from(line, "utf8");
		const out: number[] = [];

		for (let i = 0; i < bytes.length;) {
			if (bytes[i] !== BACKSLASH || i > bytes.length - 4) {
				out.push(bytes[i++]);
				continue;
			}

			if (bytes[i + 1] === M && bytes[i + 2] === CARET) {
				out.push((bytes[i + 3] & 0x7f) + 0x40);
			} else if (bytes[i + 1] === M && bytes[i + 2] === DASH) {
				out.push(bytes[i + 3] | 0x80);
			} else if (isDigit(bytes[i + 1]) && isDigit(bytes[i + 2]) && isDigit(bytes[i + 3])) {
				out.push(decodeOctal(bytes[i + 1], bytes[i + 2], bytes[i + 3]));
			} else {
				// Unknown escape sequence.
				out.push(...bytes.subarray(i, i + 4));
			}

			i += 4;
		}

		return utf8Decoder.decode(Uint8Array.from(out));
	} catch (err) {
		return line;
	}
}
