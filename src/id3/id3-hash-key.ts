/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { Id3Frame } from './id3-frames';
import {
	decodeText,
	Id3V2TextEncoding,
	readEncodedText,
	readLatin1Text,
	textEncodingFromByte,
} from './id3-misc';

/**
 * The lookup key of a tag slot. Most frames are keyed by their ID alone; frames that may repeat with a different
 * meaning (TXXX, WXXX, COMM, USLT, APIC, POPM) add the fields that tell them apart.
 * @public
 */
export type HashKey =
	| { type: 'simple'; id: string }
	| { type: 'composite'; id: string; discriminators: string[] };

const simpleKey = (id: string): HashKey => ({ type: 'simple', id });
const compositeKey = (id: string, ...discriminators: string[]): HashKey => ({
	type: 'composite',
	id,
	discriminators,
});

/** @public */
export const getFrameHashKey = (frame: Id3Frame): HashKey => {
	switch (frame.type) {
		case 'userText': return compositeKey(frame.id, frame.description);
		case 'userUrl': return compositeKey(frame.id, frame.description);
		case 'comment':
		case 'lyrics': return compositeKey(frame.id, frame.description, frame.language);
		case 'picture': return compositeKey(frame.id, frame.description);
		case 'popularimeter': return compositeKey(frame.id, frame.email);
		default: return simpleKey(frame.id);
	}
};

/** Display form of a key, e.g. `TIT2` or `COMM:notes:eng`. @public */
export const formatHashKey = (key: HashKey) => {
	return key.type === 'simple'
		? key.id
		: [key.id, ...key.discriminators].join(':');
};

/**
 * Parses the display form of a key. The ID ends at the first colon; for COMM and USLT the language follows the last
 * colon, so descriptions may themselves contain colons.
 * @public
 */
export const parseHashKey = (text: string): HashKey => {
	const idEnd = text.indexOf(':');
	if (idEnd === -1) {
		return simpleKey(text);
	}

	const id = text.slice(0, idEnd);
	const rest = text.slice(idEnd + 1);

	if (id === 'COMM' || id === 'USLT') {
		const languageStart = rest.lastIndexOf(':');
		if (languageStart === -1) {
			return compositeKey(id, rest, '');
		}

		return compositeKey(id, rest.slice(0, languageStart), rest.slice(languageStart + 1));
	}

	return compositeKey(id, rest);
};

export const toHashKey = (key: HashKey | string) => {
	return typeof key === 'string' ? parseHashKey(key) : key;
};

/** Unambiguous string used internally as the map key. */
export const getHashKeyMapKey = (key: HashKey) => {
	return key.type === 'simple'
		? key.id
		: JSON.stringify([key.id, ...key.discriminators]);
};

const readEncodingAndDescription = (data: Uint8Array, skip = 0) => {
	const encoding = data.length > 0 ? textEncodingFromByte(data[0]!) : null;
	if (encoding === null) {
		return null;
	}

	return readEncodedText(data.subarray(1 + skip), encoding).text;
};

/**
 * Computes the key of a frame straight from its payload, reading only the fields that make up the key. Payloads too
 * malformed to yield the fields fall back to the simple key.
 */
export const quickHashKey = (id: string, data: Uint8Array): HashKey => {
	switch (id) {
		case 'TXXX':
		case 'WXXX': {
			const description = readEncodingAndDescription(data);
			return description === null ? simpleKey(id) : compositeKey(id, description);
		}

		case 'APIC': {
			const encoding = data.length > 0 ? textEncodingFromByte(data[0]!) : null;
			if (encoding === null) {
				return simpleKey(id);
			}

			// Skip the MIME type and the picture type byte
			const mime = readLatin1Text(data.subarray(1));
			const descriptionStart = 1 + mime.consumed + 1;
			if (descriptionStart > data.length) {
				return simpleKey(id);
			}

			return compositeKey(id, readEncodedText(data.subarray(descriptionStart), encoding).text);
		}

		case 'COMM':
		case 'USLT': {
			if (data.length < 4) {
				return simpleKey(id);
			}

			const description = readEncodingAndDescription(data, 3);
			if (description === null) {
				return simpleKey(id);
			}

			const language = decodeText(data.subarray(1, 4), Id3V2TextEncoding.ISO_8859_1);
			return compositeKey(id, description, language);
		}

		case 'POPM': {
			return compositeKey(id, readLatin1Text(data).text);
		}

		default: return simpleKey(id);
	}
};
