/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { closeSync, fstatSync, openSync, readFileSync, readSync, writeFileSync } from 'node:fs';
import { concatBytes } from '../misc';
import { isId3Error } from './id3-error';
import { getId3TagFullSize, Id3Header, parseId3Header } from './id3-header';
import { ID3_HEADER_SIZE, ID3V1_SIZE } from './id3-misc';
import { parseId3Tag } from './id3-reader';
import { Id3Tags } from './id3-tags';
import { findId3v1, makeId3v1, mergeId3v1, parseId3v1 } from './id3v1';
import { renderId3Tag } from './id3-writer';

/**
 * Options for writing a tag.
 * @public
 */
export type Id3SaveOptions = {
	/** Major version of the written tag. Defaults to 4. */
	version?: 3 | 4;
	/** Bytes of zero padding after the frames. Defaults to 1024. */
	padding?: number;
	/**
	 * What happens to a trailing ID3v1 tag. `'keep'` (the default) leaves the file's trailing bytes as they are,
	 * `'remove'` strips an existing one, `'update'` rewrites an existing one from the frames and `'create'` always
	 * writes one.
	 */
	v1?: 'keep' | 'remove' | 'update' | 'create';
};

/** @public */
export type Id3LoadResult = {
	tags: Id3Tags;
	/** Header of the ID3v2 tag, or null when the file only had an ID3v1 tag or none at all. */
	header: Id3Header | null;
};

export const validateId3SaveOptions = (options: Id3SaveOptions) => {
	if (!options || typeof options !== 'object') {
		throw new TypeError('options must be an object.');
	}
	if (options.version !== undefined && options.version !== 3 && options.version !== 4) {
		throw new TypeError('options.version, when provided, must be 3 or 4.');
	}
	if (options.padding !== undefined && (!Number.isInteger(options.padding) || options.padding < 0)) {
		throw new TypeError('options.padding, when provided, must be a non-negative integer.');
	}
	if (
		options.v1 !== undefined
		&& !['keep', 'remove', 'update', 'create'].includes(options.v1)
	) {
		throw new TypeError('options.v1, when provided, must be \'keep\', \'remove\', \'update\' or \'create\'.');
	}
};

/** Parses the header at the start of the data, or returns null when there is no ID3v2 tag. */
const tryParseHeader = (bytes: Uint8Array) => {
	try {
		return parseId3Header(bytes);
	} catch (error) {
		if (isId3Error(error, 'noHeader')) {
			return null;
		}

		throw error;
	}
};

/** Size of the ID3v2 tag at the start of the file, 0 when there is none or its header cannot be read. */
const getExistingTagSize = (fileBytes: Uint8Array) => {
	try {
		return Math.min(getId3TagFullSize(parseId3Header(fileBytes)), fileBytes.length);
	} catch (error) {
		if (isId3Error(error)) {
			return 0;
		}

		throw error;
	}
};

const mergeTrailingId3v1 = (tags: Id3Tags, trailer: Uint8Array | null) => {
	if (trailer) {
		mergeId3v1(tags, parseId3v1(trailer));
	}
};

/**
 * Loads the tags of a file held in memory: the ID3v2 tag at its start, completed by the fields of a trailing ID3v1
 * tag. A file without either yields an empty container.
 * @public
 */
export const loadId3FromBytes = (bytes: Uint8Array): Id3LoadResult => {
	const header = tryParseHeader(bytes);
	if (!header) {
		const tags = new Id3Tags();
		mergeTrailingId3v1(tags, findId3v1(bytes));
		return { tags, header: null };
	}

	const body = bytes.subarray(ID3_HEADER_SIZE, ID3_HEADER_SIZE + header.size);
	const tags = parseId3Tag(header, body);
	mergeTrailingId3v1(tags, findId3v1(bytes.subarray(Math.min(getId3TagFullSize(header), bytes.length))));

	return { tags, header };
};

const readAt = (fd: number, position: number, length: number) => {
	const buffer = new Uint8Array(length);
	let bytesRead = 0;
	while (bytesRead < length) {
		const count = readSync(fd, buffer, bytesRead, length - bytesRead, position + bytesRead);
		if (count === 0) {
			break;
		}
		bytesRead += count;
	}

	return buffer.subarray(0, bytesRead);
};

/**
 * Loads the tags of a file. Only the tag region and the last 128 bytes are read, never the audio data in between.
 * @public
 */
export const loadId3 = (source: string | Uint8Array): Id3LoadResult => {
	if (typeof source !== 'string') {
		return loadId3FromBytes(source);
	}

	const fd = openSync(source, 'r');
	try {
		const headerBytes = readAt(fd, 0, ID3_HEADER_SIZE);
		const header = tryParseHeader(headerBytes);

		let tags: Id3Tags;
		if (header) {
			const body = readAt(fd, ID3_HEADER_SIZE, header.size);
			tags = parseId3Tag(header, body);
		} else {
			tags = new Id3Tags();
		}

		const { size } = fstatSync(fd);
		const tagEnd = header ? getId3TagFullSize(header) : 0;
		if (size - ID3V1_SIZE >= tagEnd) {
			mergeTrailingId3v1(tags, findId3v1(readAt(fd, size - ID3V1_SIZE, ID3V1_SIZE)));
		}

		return { tags, header };
	} finally {
		closeSync(fd);
	}
};

/**
 * Returns the file with its ID3v2 tag replaced by the rendered `tags`. The bytes following the old tag are kept
 * exactly, unless the `v1` option changes the trailing ID3v1 tag.
 * @public
 */
export const spliceId3 = (fileBytes: Uint8Array, tags: Id3Tags, options: Id3SaveOptions = {}) => {
	validateId3SaveOptions(options);

	const version = options.version ?? 4;
	const padding = options.padding ?? 1024;
	const v1Mode = options.v1 ?? 'keep';

	const oldTagSize = getExistingTagSize(fileBytes);
	let rest = fileBytes.subarray(oldTagSize);

	const hasV1 = findId3v1(rest) !== null;
	let trailer: Uint8Array | null = null;

	switch (v1Mode) {
		case 'keep': break;
		case 'remove': {
			if (hasV1) {
				rest = rest.subarray(0, rest.length - ID3V1_SIZE);
			}
		}; break;
		case 'update':
		case 'create': {
			if (hasV1) {
				rest = rest.subarray(0, rest.length - ID3V1_SIZE);
			}
			if (hasV1 || v1Mode === 'create') {
				trailer = makeId3v1(tags.values());
			}
		}; break;
	}

	const chunks: Uint8Array[] = [renderId3Tag(tags, version, padding), rest];
	if (trailer) {
		chunks.push(trailer);
	}

	return concatBytes(chunks);
};

/**
 * Writes the tags to the file at `path`, replacing its current ID3v2 tag.
 * @public
 */
export const saveId3 = (path: string, tags: Id3Tags, options: Id3SaveOptions = {}) => {
	const fileBytes = readFileSync(path);
	writeFileSync(path, spliceId3(fileBytes, tags, options));
};

/**
 * Returns the file without its ID3v2 tag and without a trailing ID3v1 tag, or null when it had neither.
 * @public
 */
export const stripId3 = (fileBytes: Uint8Array) => {
	const oldTagSize = getExistingTagSize(fileBytes);
	let rest = fileBytes.subarray(oldTagSize);

	const hasV1 = findId3v1(rest) !== null;
	if (hasV1) {
		rest = rest.subarray(0, rest.length - ID3V1_SIZE);
	}

	if (oldTagSize === 0 && !hasV1) {
		return null;
	}

	return rest.slice();
};

/**
 * Removes the ID3v2 tag and a trailing ID3v1 tag from the file at `path`. Files without either are left untouched.
 * Returns whether the file was changed.
 * @public
 */
export const deleteId3 = (path: string) => {
	const stripped = stripId3(readFileSync(path));
	if (!stripped) {
		return false;
	}

	writeFileSync(path, stripped);
	return true;
};
