/**
 * Query Transport Types
 *
 * Request shapes sent to the Core, the failures a call can end in, and the
 * typed record of what the Core answered.
 */

import type { CoreEdge, GraphStatus, StageInfo } from './schemas.js';

export type { CoreEdge, GraphStatus, StageInfo } from './schemas.js';

/** Node and entity identifiers are non-negative integers */
export type NodeId = number;

// ============================================================================
// Requests
// ============================================================================

export type QueryType = 'lookup' | 'traverse' | 'strongest_path' | 'intersect' | 'related';

export type QueryRequest =
  | { type: 'lookup'; entity_id: NodeId }
  | { type: 'traverse'; node_id: NodeId; depth: number }
  | { type: 'strongest_path'; start: NodeId; end: NodeId }
  | { type: 'intersect'; nodes: NodeId[] }
  | { type: 'related'; node_id: NodeId; depth: number };

export interface SignalRequest {
  entity_id: NodeId;
  attribute: string;
  value: string;
}

/** Every operation the transport can perform, used as the audit query tag */
export type CoreOperation = QueryType | 'signal' | 'status' | 'stage' | 'health';

export interface CallOptions {
  /** Overrides the client timeout for this call */
  timeoutMs?: number;
  /** Abandons the call when aborted; resolves to a `Cancelled` failure */
  signal?: AbortSignal;
}

// ============================================================================
// Failures
// ============================================================================

export type TransportFailure =
  | { kind: 'ConnectionFailed'; message: string }
  | { kind: 'Timeout'; message: string; timeoutMs: number }
  | { kind: 'HttpError'; message: string; status: number }
  | { kind: 'MalformedResponse'; message: string; body: string }
  | { kind: 'CoreRejected'; message: string }
  | { kind: 'NotStarted'; message: string }
  | { kind: 'Cancelled'; message: string };

export type TransportFailureKind = TransportFailure['kind'];

// ============================================================================
// Replies
// ============================================================================

/**
 * What the Core said, in one of its known shapes. `raw` keeps the body text
 * of an answer that could not be decoded; `absent` marks a classification
 * made without any Core reply attached.
 */
export type CoreResponseRecord =
  | { kind: 'query-found'; path: NodeId[]; edges: CoreEdge[] }
  | { kind: 'query-not-found' }
  | { kind: 'signal-result'; nodeId: NodeId }
  | { kind: 'status'; status: GraphStatus }
  | { kind: 'stage'; stage: StageInfo }
  | { kind: 'failure'; failure: TransportFailure }
  | { kind: 'raw'; text: string }
  | { kind: 'absent' };

export type CoreReply<T> =
  | { ok: true; value: T; record: CoreResponseRecord }
  | { ok: false; failure: TransportFailure; record: CoreResponseRecord };

/**
 * Record to keep for a failed call. Undecodable bodies are kept verbatim.
 */
export function failureRecord(failure: TransportFailure): CoreResponseRecord {
  if (failure.kind === 'MalformedResponse') {
    return { kind: 'raw', text: failure.body };
  }
  return { kind: 'failure', failure };
}

export function failedReply<T>(failure: TransportFailure): CoreReply<T> {
  return { ok: false, failure, record: failureRecord(failure) };
}

/**
 * One-line description of a failure for Unknown explanations and logs
 */
export function describeFailure(failure: TransportFailure): string {
  switch (failure.kind) {
    case 'HttpError':
      return `HTTP ${failure.status}`;
    case 'Timeout':
      return `timed out after ${failure.timeoutMs}ms`;
    case 'NotStarted':
      return 'client not started';
    case 'Cancelled':
      return 'cancelled';
    case 'ConnectionFailed':
      return `connection failed: ${failure.message}`;
    case 'MalformedResponse':
      return `malformed response: ${failure.message}`;
    case 'CoreRejected':
      return `rejected by Core: ${failure.message}`;
  }
}
