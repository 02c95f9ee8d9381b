/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

/**
 * The kinds of failure the ID3 engine reports.
 *
 * - `noHeader`: the data does not start with an ID3v2 header. Loading treats this as "no ID3v2 tag".
 * - `unsupportedVersion`: the header names a major version other than 2, 3 or 4.
 * - `badUnsynchData`: unsynchronised data could not be restored.
 * - `badCompressedData`: a compressed frame failed to inflate.
 * - `malformed`: a structural field is truncated or inconsistent.
 * @public
 */
export type Id3ErrorKind =
	| 'noHeader'
	| 'unsupportedVersion'
	| 'badUnsynchData'
	| 'badCompressedData'
	| 'malformed';

/**
 * Error thrown by the ID3 engine. Inspect `kind` to tell the failure modes apart.
 * @public
 */
export class Id3Error extends Error {
	constructor(public readonly kind: Id3ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'Id3Error';
	}
}

export const isId3Error = (error: unknown, kind?: Id3ErrorKind): error is Id3Error => {
	return error instanceof Id3Error && (kind === undefined || error.kind === kind);
};
