/**
 * Grounding Types
 */

import type { NodeId } from '../transport/types.js';

/** One weighted edge of the evidence the Core returned */
export interface SubgraphEdge {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly weight: number;
}

/**
 * Concrete evidence returned by the Core. `path` is never empty.
 */
export interface Artifact {
  readonly path: readonly NodeId[];
  readonly subgraph: readonly SubgraphEdge[] | null;
}

/**
 * Canonical, immutable outcome of a successful Core query. A `verified`
 * result always carries confidence 100 and a non-empty evidence path.
 */
export interface GroundedResult {
  readonly artifact: Artifact | null;
  /** Integer in [0, 100] */
  readonly confidence: number;
  readonly verified: boolean;
  readonly evidencePath: readonly NodeId[];
}

export const FULL_CONFIDENCE = 100;
