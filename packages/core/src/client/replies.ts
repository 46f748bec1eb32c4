/**
 * Transport-agnostic interpretation of decoded Core answers. Both client
 * modes run every answer through these functions, so they cannot disagree
 * about what a response means.
 */

import { parseGroundedResult, queryRecord } from '../grounding/parser.js';
import type { GroundedResult } from '../grounding/types.js';
import type { TransportResult } from '../transport/http-transport.js';
import type {
  GraphStatus,
  QueryResponse,
  SignalResponse,
  StageInfo,
} from '../transport/schemas.js';
import { failedReply, type CoreReply, type NodeId } from '../transport/types.js';

function rejected<T>(error: string | null | undefined): CoreReply<T> {
  return failedReply({ kind: 'CoreRejected', message: error ?? 'Core reported failure' });
}

export function interpretQuery(outcome: TransportResult<QueryResponse>): CoreReply<GroundedResult> {
  if (!outcome.ok) {
    return failedReply(outcome.failure);
  }
  if (!outcome.value.success) {
    return rejected(outcome.value.error);
  }
  return {
    ok: true,
    value: parseGroundedResult(outcome.value),
    record: queryRecord(outcome.value),
  };
}

export function interpretSignal(outcome: TransportResult<SignalResponse>): CoreReply<NodeId> {
  if (!outcome.ok) {
    return failedReply(outcome.failure);
  }
  const { success, node_id: nodeId, error } = outcome.value;
  if (!success) {
    return rejected(error);
  }
  if (nodeId === null || nodeId === undefined) {
    return failedReply({
      kind: 'MalformedResponse',
      message: 'Signal accepted without a node_id',
      body: JSON.stringify(outcome.value),
    });
  }
  return { ok: true, value: nodeId, record: { kind: 'signal-result', nodeId } };
}

export function interpretStatus(outcome: TransportResult<GraphStatus>): CoreReply<GraphStatus> {
  if (!outcome.ok) {
    return failedReply(outcome.failure);
  }
  return { ok: true, value: outcome.value, record: { kind: 'status', status: outcome.value } };
}

export function interpretStage(outcome: TransportResult<StageInfo>): CoreReply<StageInfo> {
  if (!outcome.ok) {
    return failedReply(outcome.failure);
  }
  return { ok: true, value: outcome.value, record: { kind: 'stage', stage: outcome.value } };
}

/**
 * Collapse a reply to the classifier's input: the result, or null when the
 * call produced no usable answer.
 */
export function groundedOrAbsent(reply: CoreReply<GroundedResult>): GroundedResult | null {
  return reply.ok ? reply.value : null;
}
