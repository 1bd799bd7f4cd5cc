/**
 * @mezo/editor
 *
 * Edit Engine: prompt workflow, manual drawing, mask edits with undo/redo,
 * and live classification of one sample image.
 *
 * @packageDocumentation
 */

export { EditSession } from './edit-session';
export type { EditSessionOptions, SessionPersistence } from './edit-session';
export { openSession } from './open-session';
export type { OpenSessionOptions, OpenedSession } from './open-session';
