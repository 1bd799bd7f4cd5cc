/**
 * @module open-session
 * Check a sample out of the library into an {@link EditSession}.
 */

import type { LibraryIndex, SampleRecord } from '@mezo/types';
import { CorruptStateError } from '@mezo/core';
import { EditSession, type EditSessionOptions } from './edit-session';

/** Session options that {@link openSession} fills in from the library. */
export type OpenSessionOptions = Omit<EditSessionOptions, 'image' | 'snapshot' | 'persistence' | 'advisory'>;

/** A sample opened for editing. */
export interface OpenedSession {
  record: SampleRecord;
  session: EditSession;
}

/**
 * Open a sample for editing, restoring its saved masks.
 *
 * When the saved masks cannot be decoded the sample opens with an empty
 * store and a `corrupt-state` advisory; the broken file is left in place
 * until the next save replaces it.
 *
 * @throws {NotFoundError} If the sample does not exist.
 * @throws {CorruptStateError} If the record or image itself is unreadable.
 */
export async function openSession(
  library: LibraryIndex,
  sampleId: string,
  options: OpenSessionOptions,
): Promise<OpenedSession> {
  const persistence = { library, sampleId };
  try {
    const { record, image, snapshot } = await library.open(sampleId);
    const session = new EditSession({ ...options, image, snapshot: snapshot ?? undefined, persistence });
    return { record, session };
  } catch (err) {
    if (!(err instanceof CorruptStateError)) throw err;

    const { record, image } = await library.openImage(sampleId);
    const message = `Saved masks of "${record.name}" could not be read; starting with no masks`;
    console.warn('[editor]', message, err.message);
    const session = new EditSession({
      ...options,
      image,
      persistence,
      advisory: { kind: 'corrupt-state', message },
    });
    return { record, session };
  }
}
