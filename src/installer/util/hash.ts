/* src/installer/util/hash.ts
 * Archive checksum for verify_checksum: the downloaded backport archive is
 * compared against expected_checksum before it is listed or extracted.
 */
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/** Lowercase hex SHA-256 of the archive at `archivePath`. */
export const sha256File = async (archivePath: string): Promise<string> =>
  createHash('sha256')
    .update(await readFile(archivePath))
    .digest('hex');
