/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { FileSlice, readAscii, readBytes, readU8 } from '../reader';
import { Id3Error } from './id3-error';
import { decodeBitPaddedInt, ID3_FOOTER_SIZE, ID3_HEADER_SIZE, isValidFrameId } from './id3-misc';

/** @public */
export type Id3MajorVersion = 2 | 3 | 4;

/** @public */
export type Id3Version = {
	major: Id3MajorVersion;
	revision: number;
};

/** @public */
export type Id3HeaderFlags = {
	unsynchronisation: boolean;
	extended: boolean;
	experimental: boolean;
	/** Only ever set for ID3v2.4 tags. */
	footer: boolean;
};

/**
 * The fixed 10-byte header in front of an ID3v2 tag.
 * @public
 */
export type Id3Header = {
	version: Id3Version;
	flags: Id3HeaderFlags;
	/** Size of the tag excluding the header (and footer). */
	size: number;
	/** Position of the header in the file. */
	offset: number;
};

const toMajorVersion = (major: number, revision: number): Id3MajorVersion => {
	switch (major) {
		case 2: return 2;
		case 3: return 3;
		case 4: return 4;
		default: throw new Id3Error('unsupportedVersion', `Unsupported ID3 version ID3v2.${major}.${revision}.`);
	}
};

/**
 * Parses an ID3v2 header from the start of `bytes`. Throws an {@link Id3Error} of kind `noHeader` when the magic is
 * missing or the data is too short, and of kind `unsupportedVersion` for major versions other than 2, 3 and 4.
 */
export const parseId3Header = (bytes: Uint8Array, offset = 0): Id3Header => {
	if (bytes.length < ID3_HEADER_SIZE) {
		throw new Id3Error('noHeader', 'No ID3 header found.');
	}

	const slice = FileSlice.fromBytes(bytes.subarray(0, ID3_HEADER_SIZE));
	if (readAscii(slice, 3) !== 'ID3') {
		throw new Id3Error('noHeader', 'No ID3 header found.');
	}

	const majorByte = readU8(slice);
	const revision = readU8(slice);
	const major = toMajorVersion(majorByte, revision);
	const flagByte = readU8(slice);

	return {
		version: { major, revision },
		flags: {
			unsynchronisation: (flagByte & 0x80) !== 0,
			extended: (flagByte & 0x40) !== 0,
			experimental: (flagByte & 0x20) !== 0,
			footer: major === 4 && (flagByte & 0x10) !== 0,
		},
		size: decodeBitPaddedInt(readBytes(slice, 4), 7),
		offset,
	};
};

/** Total number of bytes the tag occupies in the file: header, tag data and the optional footer. */
export const getId3TagFullSize = (header: Id3Header) => {
	return ID3_HEADER_SIZE + header.size + (header.flags.footer ? ID3_FOOTER_SIZE : 0);
};

const countValidFrames = (data: Uint8Array, bits: 7 | 8) => {
	const frameHeaderSize = 10;
	let pos = 0;
	let count = 0;

	while (pos + frameHeaderSize < data.length) {
		if (data[pos] === 0) {
			break;
		}

		if (!isValidFrameId(data.subarray(pos, pos + 4))) {
			break;
		}

		const size = decodeBitPaddedInt(data.subarray(pos + 4, pos + 8), bits);
		if (size === 0 || pos + frameHeaderSize + size > data.length) {
			break;
		}

		count++;
		pos += frameHeaderSize + size;
	}

	return count;
};

/**
 * Determines how many bits per byte the frame size fields of an ID3v2.4 tag use. The standard demands syncsafe
 * integers (7), but some encoders (iTunes among them) write plain integers (8). Both readings are tried on the frame
 * region and the one that walks over more well-formed frames wins, syncsafe on a tie.
 */
export const determineFrameSizeBits = (data: Uint8Array): 7 | 8 => {
	const syncsafeCount = countValidFrames(data, 7);
	const normalCount = countValidFrames(data, 8);

	return syncsafeCount >= normalCount ? 7 : 8;
};
