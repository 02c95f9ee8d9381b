/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { inflateSync } from 'node:zlib';
import { FileSlice, readAscii, readBytes, readU16Be, readU24Be } from '../reader';
import { Id3Error } from './id3-error';
import { convertV22FrameId, parseV22PictureFrame } from './id3-frames';
import { determineFrameSizeBits, Id3Header } from './id3-header';
import { decodeBitPaddedInt, decodeUnsynchronisation, isValidFrameId } from './id3-misc';
import { Id3Tags } from './id3-tags';

const V22_FRAME_HEADER_SIZE = 6;
const FRAME_HEADER_SIZE = 10;

type FrameFlags = {
	compressed: boolean;
	encrypted: boolean;
	unsynchronised: boolean;
	dataLengthIndicator: boolean;
};

const parseFrameFlags = (flags: number, majorVersion: number): FrameFlags => {
	if (majorVersion === 4) {
		return {
			compressed: (flags & 0x0008) !== 0,
			encrypted: (flags & 0x0004) !== 0,
			unsynchronised: (flags & 0x0002) !== 0,
			dataLengthIndicator: (flags & 0x0001) !== 0,
		};
	}

	// ID3v2.3 compressed frames are prefixed with their decompressed size
	const compressed = (flags & 0x0080) !== 0;
	return {
		compressed,
		encrypted: (flags & 0x0040) !== 0,
		unsynchronised: false,
		dataLengthIndicator: compressed,
	};
};

/** Returns where the frames start, skipping the extended header if there is one. */
const getFramesStart = (header: Id3Header, data: Uint8Array) => {
	if (!header.flags.extended || header.version.major === 2 || data.length < 4) {
		return 0;
	}

	const sizeBytes = data.subarray(0, 4);

	// The ID3v2.4 size counts the whole extended header, the ID3v2.3 size excludes its own four bytes
	return header.version.major === 4 ? decodeBitPaddedInt(sizeBytes, 7) : decodeBitPaddedInt(sizeBytes, 8) + 4;
};

const readV22Frames = (tags: Id3Tags, data: Uint8Array) => {
	const slice = FileSlice.fromBytes(data);

	while (slice.bufferPos + V22_FRAME_HEADER_SIZE <= data.length) {
		if (data[slice.bufferPos] === 0) {
			break; // Padding
		}

		const idBytes = data.subarray(slice.bufferPos, slice.bufferPos + 3);
		if (!isValidFrameId(idBytes)) {
			break;
		}

		const id = readAscii(slice, 3);
		const size = readU24Be(slice);
		if (size === 0 || slice.bufferPos + size > data.length) {
			break;
		}

		const payload = readBytes(slice, size);

		if (id === 'PIC') {
			try {
				tags.add(parseV22PictureFrame(payload));
			} catch (error) {
				console.warn('Malformed PIC frame, keeping it as an unknown frame.', error);
				tags.unknownFrames.push({ id, data: payload.slice() });
			}
			continue;
		}

		const mappedId = convertV22FrameId(id);
		if (mappedId === null) {
			tags.unknownFrames.push({ id, data: payload.slice() });
			continue;
		}

		tags.addRaw(mappedId, payload.slice());
	}
};

const readFrames = (tags: Id3Tags, data: Uint8Array, majorVersion: 3 | 4) => {
	const buffer = tags._buffers.register(data);
	const bits = majorVersion === 4 ? determineFrameSizeBits(data) : 8;
	const slice = FileSlice.fromBytes(data);

	while (slice.bufferPos + FRAME_HEADER_SIZE <= data.length) {
		if (data[slice.bufferPos] === 0) {
			break; // Padding
		}

		const idBytes = data.subarray(slice.bufferPos, slice.bufferPos + 4);
		if (!isValidFrameId(idBytes)) {
			break;
		}

		const id = readAscii(slice, 4);
		const size = decodeBitPaddedInt(readBytes(slice, 4), bits);
		const flags = parseFrameFlags(readU16Be(slice), majorVersion);
		if (size === 0 || slice.bufferPos + size > data.length) {
			break;
		}

		const offset = slice.bufferPos;
		const payload = readBytes(slice, size);

		if (!flags.compressed && !flags.encrypted && !flags.unsynchronised && !flags.dataLengthIndicator) {
			tags._addSlice(id, buffer, offset, size);
			continue;
		}

		if (flags.encrypted) {
			tags.unknownFrames.push({ id, data: payload.slice() });
			continue;
		}

		let frameData = payload;
		if (flags.dataLengthIndicator && frameData.length >= 4) {
			frameData = frameData.subarray(4);
		}
		if (flags.unsynchronised) {
			frameData = decodeUnsynchronisation(frameData);
		}
		if (flags.compressed) {
			try {
				frameData = inflateSync(frameData);
			} catch (cause) {
				const error = new Id3Error('badCompressedData', `Could not inflate ${id} frame.`, { cause });
				console.warn(`Keeping compressed ${id} frame as an unknown frame.`, error);
				tags.unknownFrames.push({ id, data: payload.slice() });
				continue;
			}
		}

		tags.addRaw(id, frameData.slice());
	}
};

/**
 * Reads the frames of a tag. `data` is the tag body following the 10-byte header, exactly `header.size` bytes long.
 * The container keeps its own copy of the frame region for frames stored undecoded.
 */
export const parseId3Tag = (header: Id3Header, data: Uint8Array) => {
	const tags = new Id3Tags(header.version);

	let body = data;
	if (header.flags.unsynchronisation && header.version.major < 4) {
		body = decodeUnsynchronisation(body);
	}

	const framesStart = getFramesStart(header, body);
	if (framesStart >= body.length) {
		return tags;
	}

	const region = body.slice(framesStart);
	if (header.version.major === 2) {
		readV22Frames(tags, region);
	} else {
		readFrames(tags, region, header.version.major);
	}

	return tags;
};
