import { randomBytes } from 'crypto';

const NAME_BYTES = 16;

/**
 * Produces a random, collision-resistant archive file name. The name is not
 * derived from the archive contents, so rebuilding identical sources always
 * yields a new name.
 */
export function generateArchiveName(extension = 'zip'): string {
  const id = randomBytes(NAME_BYTES).toString('hex');
  return extension ? `${id}.${extension}` : id;
}
