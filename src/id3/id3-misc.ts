/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import iconv from 'iconv-lite';
import { Id3Error } from './id3-error';

export const ID3_HEADER_SIZE = 10;
export const ID3_FOOTER_SIZE = 10;
export const ID3V1_SIZE = 128;

/**
 * The text encoding byte at the start of most ID3v2 frames.
 * @public
 */
export enum Id3V2TextEncoding {
	ISO_8859_1 = 0,
	/** UTF-16 prefixed with a byte order mark. Little-endian is assumed when the mark is missing. */
	UTF_16_WITH_BOM = 1,
	UTF_16_BE_NO_BOM = 2,
	/** Only legal in ID3v2.4. */
	UTF_8 = 3,
}

export const textEncodingFromByte = (byte: number) => {
	switch (byte) {
		case 0: return Id3V2TextEncoding.ISO_8859_1;
		case 1: return Id3V2TextEncoding.UTF_16_WITH_BOM;
		case 2: return Id3V2TextEncoding.UTF_16_BE_NO_BOM;
		case 3: return Id3V2TextEncoding.UTF_8;
		default: return null;
	}
};

export const parseTextEncoding = (byte: number) => {
	const encoding = textEncodingFromByte(byte);
	if (encoding === null) {
		throw new Id3Error('malformed', `Invalid text encoding byte ${byte}.`);
	}

	return encoding;
};

/**
 * The picture type byte of APIC and PIC frames.
 * @public
 */
export enum PictureType {
	Other = 0,
	FileIcon = 1,
	OtherFileIcon = 2,
	CoverFront = 3,
	CoverBack = 4,
	LeafletPage = 5,
	Media = 6,
	LeadArtist = 7,
	Artist = 8,
	Conductor = 9,
	Band = 10,
	Composer = 11,
	Lyricist = 12,
	RecordingLocation = 13,
	DuringRecording = 14,
	DuringPerformance = 15,
	MovieCapture = 16,
	AFishEvenBrighter = 17,
	Illustration = 18,
	BandLogo = 19,
	PublisherLogo = 20,
}

export const parsePictureType = (byte: number): PictureType => {
	return byte <= PictureType.PublisherLogo ? byte : PictureType.Other;
};

/**
 * Decodes a big-endian integer in which each byte contributes only its low `bits` bits. With `bits = 7` this is the
 * syncsafe integer used by ID3v2 headers, with `bits = 8` a plain big-endian integer.
 */
export const decodeBitPaddedInt = (bytes: Uint8Array, bits: 7 | 8) => {
	const mask = (1 << bits) - 1;
	const factor = 2 ** bits;
	let result = 0;

	for (const byte of bytes) {
		result = result * factor + (byte & mask);
	}

	return result;
};

export const encodeBitPaddedInt = (value: number, width: number, bits: 7 | 8) => {
	const mask = (1 << bits) - 1;
	const factor = 2 ** bits;
	const result = new Uint8Array(width);
	let rest = value;

	for (let i = width - 1; i >= 0; i--) {
		result[i] = rest & mask;
		rest = Math.floor(rest / factor);
	}

	return result;
};

/** Removes the 0x00 byte that unsynchronisation placed after every 0xFF. */
export const decodeUnsynchronisation = (data: Uint8Array) => {
	const output = new Uint8Array(data.length);
	let length = 0;

	for (let i = 0; i < data.length; i++) {
		const byte = data[i]!;
		output[length++] = byte;

		if (byte === 0xff && data[i + 1] === 0x00) {
			i++;
		}
	}

	return output.slice(0, length);
};

/** Inserts a 0x00 byte after every 0xFF so that the data can never contain an MPEG frame sync. */
export const encodeUnsynchronisation = (data: Uint8Array) => {
	let count = 0;
	for (const byte of data) {
		if (byte === 0xff) {
			count++;
		}
	}

	const output = new Uint8Array(data.length + count);
	let pos = 0;
	for (const byte of data) {
		output[pos++] = byte;
		if (byte === 0xff) {
			output[pos++] = 0x00;
		}
	}

	return output;
};

/** Frame IDs consist of uppercase ASCII letters and digits only. */
export const isFrameIdByte = (byte: number) => {
	return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x30 && byte <= 0x39);
};

export const isValidFrameId = (bytes: Uint8Array) => {
	return bytes.every(isFrameIdByte);
};

export const nullTerminatorSize = (encoding: Id3V2TextEncoding) => {
	return encoding === Id3V2TextEncoding.UTF_16_WITH_BOM || encoding === Id3V2TextEncoding.UTF_16_BE_NO_BOM
		? 2
		: 1;
};

/** Returns the position of the first null terminator, or -1. UTF-16 terminators are only matched on even offsets. */
export const findNullTerminator = (data: Uint8Array, encoding: Id3V2TextEncoding) => {
	if (nullTerminatorSize(encoding) === 1) {
		return data.indexOf(0);
	}

	for (let i = 0; i + 1 < data.length; i += 2) {
		if (data[i] === 0 && data[i + 1] === 0) {
			return i;
		}
	}

	return -1;
};

const toBuffer = (bytes: Uint8Array) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const getUtf16ByteOrder = (data: Uint8Array): 'utf16le' | 'utf16be' | null => {
	if (data[0] === 0xff && data[1] === 0xfe) {
		return 'utf16le';
	}
	if (data[0] === 0xfe && data[1] === 0xff) {
		return 'utf16be';
	}
	return null;
};

/**
 * Decodes text in the given encoding. Invalid input never throws; undecodable sequences become U+FFFD.
 * `fallbackByteOrder` is used for BOM-less UTF-16 data.
 */
export const decodeText = (
	data: Uint8Array,
	encoding: Id3V2TextEncoding,
	fallbackByteOrder: 'utf16le' | 'utf16be' = 'utf16le',
) => {
	switch (encoding) {
		case Id3V2TextEncoding.ISO_8859_1: {
			return iconv.decode(toBuffer(data), 'latin1');
		}
		case Id3V2TextEncoding.UTF_16_WITH_BOM: {
			if (data.length < 2) {
				return '';
			}

			const byteOrder = getUtf16ByteOrder(data);
			if (byteOrder) {
				return iconv.decode(toBuffer(data.subarray(2)), byteOrder);
			}

			return iconv.decode(toBuffer(data), fallbackByteOrder);
		}
		case Id3V2TextEncoding.UTF_16_BE_NO_BOM: {
			return iconv.decode(toBuffer(data), 'utf16be');
		}
		case Id3V2TextEncoding.UTF_8: {
			return iconv.decode(toBuffer(data), 'utf8');
		}
	}
};

/** Encodes text without a terminator. UTF-16 output starts with a little-endian byte order mark. */
export const encodeText = (text: string, encoding: Id3V2TextEncoding): Uint8Array => {
	switch (encoding) {
		case Id3V2TextEncoding.ISO_8859_1: {
			return iconv.encode(text, 'latin1');
		}
		case Id3V2TextEncoding.UTF_16_WITH_BOM: {
			return iconv.encode(text, 'utf16le', { addBOM: true });
		}
		case Id3V2TextEncoding.UTF_16_BE_NO_BOM: {
			return iconv.encode(text, 'utf16be');
		}
		case Id3V2TextEncoding.UTF_8: {
			return iconv.encode(text, 'utf8');
		}
	}
};

/**
 * Reads a null-terminated string from the start of `data`. Returns the text and the number of bytes consumed,
 * including the terminator. Without a terminator the whole input is taken.
 */
export const readEncodedText = (data: Uint8Array, encoding: Id3V2TextEncoding) => {
	const end = findNullTerminator(data, encoding);
	if (end === -1) {
		return { text: decodeText(data, encoding), consumed: data.length };
	}

	return {
		text: decodeText(data.subarray(0, end), encoding),
		consumed: end + nullTerminatorSize(encoding),
	};
};

export const readLatin1Text = (data: Uint8Array) => {
	return readEncodedText(data, Id3V2TextEncoding.ISO_8859_1);
};

/**
 * Splits text data into its null-separated values, dropping empty trailing values. Every UTF-16 value may carry its
 * own byte order mark; values without one inherit the byte order of the first.
 */
export const decodeTextValues = (data: Uint8Array, encoding: Id3V2TextEncoding) => {
	const terminatorSize = nullTerminatorSize(encoding);
	const values: string[] = [];
	let byteOrder: 'utf16le' | 'utf16be' = 'utf16le';
	let rest = data;

	while (true) {
		const end = findNullTerminator(rest, encoding);
		const segment = end === -1 ? rest : rest.subarray(0, end);

		if (values.length === 0 && encoding === Id3V2TextEncoding.UTF_16_WITH_BOM) {
			byteOrder = getUtf16ByteOrder(segment) ?? byteOrder;
		}

		values.push(decodeText(segment, encoding, byteOrder));

		if (end === -1) {
			break;
		}

		rest = rest.subarray(end + terminatorSize);
	}

	while (values.length > 0 && values[values.length - 1] === '') {
		values.pop();
	}

	return values;
};

/** Encodes a null-terminated string. */
export const encodeTerminatedText = (text: string, encoding: Id3V2TextEncoding) => {
	const encoded = encodeText(text, encoding);
	const result = new Uint8Array(encoded.length + nullTerminatorSize(encoding));
	result.set(encoded);

	return result;
};
