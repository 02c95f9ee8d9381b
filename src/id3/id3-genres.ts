/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import GENRE_TABLE from './id3v1-genres.json';

/** The ID3v1 genre table including the Winamp extensions, indexed by genre byte. @public */
export const GENRES: readonly string[] = GENRE_TABLE;

const genreFromIndex = (index: number) => GENRES[index] ?? `Unknown(${index})`;

const isIndex = (text: string) => /^\d+$/.test(text);

/**
 * Resolves the genre text of a TCON frame into genre names. Understands numeric references (`17`, `(17)`), the
 * `(RX)` and `(CR)` codes, references followed by a refinement (`(17)Rock`) and null-separated lists.
 * @public
 */
export const parseGenre = (text: string) => {
	const genres: string[] = [];
	const push = (genre: string) => {
		if (genre !== '' && !genres.includes(genre)) {
			genres.push(genre);
		}
	};

	for (const part of text.split('\0')) {
		let remaining = part.trim();

		while (remaining.startsWith('(')) {
			const close = remaining.indexOf(')');
			if (close === -1) {
				break;
			}

			const inner = remaining.slice(1, close);
			remaining = remaining.slice(close + 1);

			if (inner === 'RX') {
				push('Remix');
			} else if (inner === 'CR') {
				push('Cover');
			} else if (isIndex(inner)) {
				push(genreFromIndex(Number(inner)));
			} else {
				push(inner);
			}
		}

		remaining = remaining.trim();
		if (isIndex(remaining)) {
			const index = Number(remaining);
			push(index < GENRES.length ? genreFromIndex(index) : remaining);
		} else {
			push(remaining);
		}
	}

	return genres;
};
