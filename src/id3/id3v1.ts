/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { bytesStartWithAscii } from '../misc';
import { CommentFrame, Id3Frame, TextFrame } from './id3-frames';
import { GENRES, parseGenre } from './id3-genres';
import { decodeText, encodeText, ID3V1_SIZE, Id3V2TextEncoding } from './id3-misc';
import { getFrameHashKey } from './id3-hash-key';
import { Id3Tags } from './id3-tags';

/** Description given to the COMM frame derived from an ID3v1 comment. */
export const ID3V1_COMMENT_DESCRIPTION = 'ID3v1 Comment';

const UNKNOWN_GENRE = 255;

/** Returns the trailing 128-byte ID3v1 tag of the file, or null. */
export const findId3v1 = (fileBytes: Uint8Array) => {
	if (fileBytes.length < ID3V1_SIZE) {
		return null;
	}

	const block = fileBytes.subarray(fileBytes.length - ID3V1_SIZE);
	return bytesStartWithAscii(block, 'TAG') ? block : null;
};

const readField = (block: Uint8Array, start: number, length: number) => {
	const field = block.subarray(start, start + length);
	const end = field.indexOf(0);

	return decodeText(end === -1 ? field : field.subarray(0, end), Id3V2TextEncoding.ISO_8859_1).trimEnd();
};

const textFrame = (id: string, text: string): TextFrame => ({
	type: 'text',
	id,
	encoding: Id3V2TextEncoding.ISO_8859_1,
	text: [text],
});

/** Converts a 128-byte ID3v1 tag into the equivalent ID3v2 frames. Empty fields produce no frame. */
export const parseId3v1 = (block: Uint8Array): Id3Frame[] => {
	if (block.length < ID3V1_SIZE || !bytesStartWithAscii(block, 'TAG')) {
		return [];
	}

	const frames: Id3Frame[] = [];
	const pushText = (id: string, text: string) => {
		if (text !== '') {
			frames.push(textFrame(id, text));
		}
	};

	pushText('TIT2', readField(block, 3, 30));
	pushText('TPE1', readField(block, 33, 30));
	pushText('TALB', readField(block, 63, 30));
	pushText('TDRC', readField(block, 93, 4));

	// ID3v1.1 keeps a track number in the last byte of the comment, behind a null byte
	const hasTrack = block[125] === 0 && block[126] !== 0;
	const comment = readField(block, 97, hasTrack ? 28 : 30);
	if (comment !== '') {
		frames.push({
			type: 'comment',
			id: 'COMM',
			encoding: Id3V2TextEncoding.ISO_8859_1,
			language: 'eng',
			description: ID3V1_COMMENT_DESCRIPTION,
			text: comment,
		} satisfies CommentFrame);
	}
	if (hasTrack) {
		pushText('TRCK', String(block[126]));
	}

	const genreIndex = block[127]!;
	if (genreIndex < GENRES.length) {
		pushText('TCON', GENRES[genreIndex]!);
	}

	return frames;
};

/** Adds the frames of an ID3v1 tag whose keys are not taken yet. ID3v2 frames always win. */
export const mergeId3v1 = (tags: Id3Tags, frames: Id3Frame[]) => {
	for (const frame of frames) {
		if (!tags.has(getFrameHashKey(frame))) {
			tags.add(frame);
		}
	}
};

const writeField = (block: Uint8Array, start: number, length: number, text: string) => {
	const bytes = encodeText(text, Id3V2TextEncoding.ISO_8859_1);
	block.set(bytes.subarray(0, length), start);
};

const getFirstText = (frames: Id3Frame[], ...ids: string[]) => {
	for (const id of ids) {
		const frame = frames.find((x): x is TextFrame => x.type === 'text' && x.id === id);
		if (frame && frame.text.length > 0) {
			return frame.text[0]!;
		}
	}

	return null;
};

/**
 * Builds a 128-byte ID3v1.1 tag from ID3v2 frames. Fields that do not fit are truncated; a genre that is not in the
 * table is written as 255.
 */
export const makeId3v1 = (frames: Id3Frame[]) => {
	const block = new Uint8Array(ID3V1_SIZE);
	writeField(block, 0, 3, 'TAG');
	writeField(block, 3, 30, getFirstText(frames, 'TIT2') ?? '');
	writeField(block, 33, 30, getFirstText(frames, 'TPE1') ?? '');
	writeField(block, 63, 30, getFirstText(frames, 'TALB') ?? '');
	writeField(block, 93, 4, getFirstText(frames, 'TDRC', 'TYER') ?? '');

	const track = Number.parseInt(getFirstText(frames, 'TRCK')?.split('/')[0] ?? '', 10);
	const hasTrack = Number.isInteger(track) && track > 0 && track <= 255;

	const comment = frames.find((x): x is CommentFrame => x.type === 'comment');
	writeField(block, 97, hasTrack ? 28 : 30, comment?.text ?? '');

	if (hasTrack) {
		block[125] = 0;
		block[126] = track;
	}

	block[127] = UNKNOWN_GENRE;
	const genreText = getFirstText(frames, 'TCON');
	if (genreText !== null) {
		const genre = parseGenre(genreText)[0];
		const index = genre === undefined ? -1 : GENRES.indexOf(genre);
		if (index !== -1) {
			block[127] = index;
		}
	}

	return block;
};
