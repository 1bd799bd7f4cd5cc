/**
 * @module errors
 * Error taxonomy of the segmentation engine.
 * Every error here is recoverable at the session level.
 */

/** Base class for all Mezo errors. */
export class MezoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MezoError';
  }
}

/** Mask geometry or attributes are invalid (empty, out of bounds, bad label). */
export class InvalidMaskError extends MezoError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMaskError';
  }
}

/** An id does not refer to a known mask or sample. */
export class NotFoundError extends MezoError {
  readonly entity: 'mask' | 'sample';
  readonly id: string;

  constructor(entity: 'mask' | 'sample', id: string) {
    super(`Unknown ${entity}: ${id}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/** Why an oracle call produced no result. */
export type OracleFailureReason = 'failed' | 'timeout' | 'cancelled';

/** The segmentation oracle failed, timed out or was cancelled. */
export class OracleUnavailableError extends MezoError {
  readonly reason: OracleFailureReason;

  constructor(reason: OracleFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailableError';
    this.reason = reason;
  }
}

/** A prompt was submitted while another oracle call is in flight. */
export class BusyError extends MezoError {
  constructor(message = 'An oracle request is already in progress') {
    super(message);
    this.name = 'BusyError';
  }
}

/** A persisted snapshot could not be decoded. */
export class CorruptStateError extends MezoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorruptStateError';
  }
}

/** An operation is not valid in the session's current mode. */
export class SessionStateError extends MezoError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

/** A sample name is already taken. */
export class DuplicateNameError extends MezoError {
  readonly sampleName: string;

  constructor(sampleName: string) {
    super(`A sample named "${sampleName}" already exists`);
    this.name = 'DuplicateNameError';
    this.sampleName = sampleName;
  }
}
