/**
 * @module session
 * Edit session modes, advisories and observable state.
 */

import type { ClassificationResult } from './classification';
import type { Point } from './common';
import type { MaskBitmap } from './mask';
import type { ProposedMask } from './oracle';

/** Edit Engine modes. */
export type SessionMode = 'idle' | 'awaiting-prompt' | 'proposing' | 'reviewing' | 'manual-draw';

/** Kind of a user-visible advisory. */
export type AdvisoryKind =
  | 'oracle-unavailable'
  | 'no-proposals'
  | 'corrupt-state'
  | 'save-failed';

/** A recoverable problem surfaced to the operator. */
export interface Advisory {
  kind: AdvisoryKind;
  message: string;
}

/** A shape drawn in manual-draw mode. */
export type ManualShape =
  | {
      kind: 'polygon';
      /** Vertices in image coordinates, at least three. */
      points: readonly Point[];
    }
  | {
      /** Circle from a centre click and an edge click. */
      kind: 'circle';
      center: Point;
      radius: number;
    }
  | {
      kind: 'brush';
      points: readonly Point[];
      radius: number;
      /** `add` paints into the draft, `remove` erases from it. */
      mode: 'add' | 'remove';
    };

/** An edit applied to a candidate before it is accepted. */
export type CandidateEdit =
  | {
      kind: 'brush';
      points: readonly Point[];
      radius: number;
      mode: 'add' | 'remove';
    }
  | {
      /** Positive grows the boundary, negative shrinks it, in pixels. */
      kind: 'boundary';
      amount: number;
    };

/** A proposed mask under review. */
export interface ReviewCandidate extends ProposedMask {
  /** Whether the operator refined it; accepted edited candidates become manual masks. */
  edited: boolean;
}

/** Observable state of an edit session. */
export interface SessionState {
  mode: SessionMode;
  /** Token of the most recent oracle request. */
  requestToken: number;
  /** Candidates being reviewed, best first. Empty outside `reviewing`. */
  candidates: readonly ReviewCandidate[];
  /** Shape being drawn in `manual-draw`, or null. */
  draft: MaskBitmap | null;
  /** The latest problem to show, until dismissed. */
  advisory: Advisory | null;
  /** Classification of the current store contents. */
  classification: ClassificationResult;
  maskCount: number;
  activeId: string | null;
  canUndo: boolean;
  canRedo: boolean;
  undoDescription: string | null;
  redoDescription: string | null;
  /** Whether the store changed since it was opened or last saved. */
  dirty: boolean;
}
