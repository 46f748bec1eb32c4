/**
 * Grounding Result Parser
 *
 * Pure conversion of a decoded Core query response into a `GroundedResult`.
 * The parser always produces a result; absence (no successful answer at all)
 * is decided by the transport, never here.
 */

import type { QueryResponse } from '../transport/schemas.js';
import type { CoreResponseRecord } from '../transport/types.js';
import { deepFreeze } from '../utils/validation.js';
import { FULL_CONFIDENCE, type GroundedResult, type SubgraphEdge } from './types.js';

const UNGROUNDED: GroundedResult = deepFreeze({
  artifact: null,
  confidence: 0,
  verified: false,
  evidencePath: [],
});

export function parseGroundedResult(response: QueryResponse): GroundedResult {
  if (!response.found || response.path.length === 0) {
    return UNGROUNDED;
  }

  const subgraph: SubgraphEdge[] | null = response.edges.length > 0
    ? response.edges.map(({ from, to, weight }) => ({ from, to, weight }))
    : null;

  return deepFreeze({
    artifact: { path: [...response.path], subgraph },
    confidence: FULL_CONFIDENCE,
    verified: true,
    evidencePath: [...response.path],
  });
}

/**
 * Typed audit record of a decoded query response
 */
export function queryRecord(response: QueryResponse): CoreResponseRecord {
  if (response.found && response.path.length > 0) {
    return {
      kind: 'query-found',
      path: [...response.path],
      edges: response.edges.map(({ from, to, weight }) => ({ from, to, weight })),
    };
  }
  return { kind: 'query-not-found' };
}

/**
 * Record for a result that did not come straight from the wire, such as one
 * built by a caller and handed to the classifier directly.
 */
export function recordFromResult(result: GroundedResult | null): CoreResponseRecord {
  if (result === null) {
    return { kind: 'absent' };
  }
  if (result.evidencePath.length > 0) {
    return {
      kind: 'query-found',
      path: [...result.evidencePath],
      edges: (result.artifact?.subgraph ?? []).map(({ from, to, weight }) => ({ from, to, weight })),
    };
  }
  return { kind: 'query-not-found' };
}
