/**
 * Request builders. Each validates its parameters and throws a
 * `ValidationError` before anything is sent to the Core.
 */

import { array, number, string, validateOrThrow } from '../utils/validation.js';
import type { NodeId, QueryRequest, SignalRequest } from './types.js';

export const MAX_DEPTH = 100;
export const DEFAULT_DEPTH = 3;
export const MAX_ATTRIBUTE_BYTES = 256;
export const MAX_VALUE_BYTES = 65536;

const COMPONENT = 'Transport';

const nodeIdValidator = number({ integer: true, min: 0 });
const depthValidator = number({ integer: true, min: 0, max: MAX_DEPTH });
const attributeValidator = string({ maxBytes: MAX_ATTRIBUTE_BYTES });
const valueValidator = string({ maxBytes: MAX_VALUE_BYTES });
const nodeListValidator = array(nodeIdValidator, { minLength: 1 });

function nodeId(value: unknown, field: string, operation: string): NodeId {
  return validateOrThrow(value, nodeIdValidator, { component: COMPONENT, operation, field });
}

function depth(value: unknown, operation: string): number {
  return validateOrThrow(value, depthValidator, { component: COMPONENT, operation, field: 'depth' });
}

export function lookupRequest(entityId: NodeId): QueryRequest {
  return { type: 'lookup', entity_id: nodeId(entityId, 'entity_id', 'lookup') };
}

export function traverseRequest(startNode: NodeId, maxDepth: number = DEFAULT_DEPTH): QueryRequest {
  return {
    type: 'traverse',
    node_id: nodeId(startNode, 'node_id', 'traverse'),
    depth: depth(maxDepth, 'traverse'),
  };
}

export function strongestPathRequest(start: NodeId, end: NodeId): QueryRequest {
  return {
    type: 'strongest_path',
    start: nodeId(start, 'start', 'strongest_path'),
    end: nodeId(end, 'end', 'strongest_path'),
  };
}

export function intersectRequest(nodes: readonly NodeId[]): QueryRequest {
  return {
    type: 'intersect',
    nodes: validateOrThrow([...nodes], nodeListValidator, {
      component: COMPONENT,
      operation: 'intersect',
      field: 'nodes',
    }),
  };
}

export function relatedRequest(node: NodeId, maxDepth: number = DEFAULT_DEPTH): QueryRequest {
  return {
    type: 'related',
    node_id: nodeId(node, 'node_id', 'related'),
    depth: depth(maxDepth, 'related'),
  };
}

export function signalRequest(entityId: NodeId, attribute: string, value: string): SignalRequest {
  const context = { component: COMPONENT, operation: 'signal' };
  return {
    entity_id: nodeId(entityId, 'entity_id', 'signal'),
    attribute: validateOrThrow(attribute, attributeValidator, { ...context, field: 'attribute' }),
    value: validateOrThrow(value, valueValidator, { ...context, field: 'value' }),
  };
}
