/**
 * Query Transport
 *
 * Validated request builders, the HTTP transport to the Core, its wire
 * schemas and the typed failures a call can end in.
 */

export {
  HttpTransport,
  isInsecureRemoteUrl,
  DEFAULT_BASE_URL,
  DEFAULT_TRANSPORT_OPTIONS,
  type FetchLike,
  type TransportOptions,
  type TransportResult,
} from './http-transport.js';

export {
  lookupRequest,
  traverseRequest,
  strongestPathRequest,
  intersectRequest,
  relatedRequest,
  signalRequest,
  MAX_DEPTH,
  DEFAULT_DEPTH,
  MAX_ATTRIBUTE_BYTES,
  MAX_VALUE_BYTES,
} from './requests.js';

export {
  coreEdgeSchema,
  queryResponseSchema,
  signalResponseSchema,
  graphStatusSchema,
  stageInfoSchema,
  type QueryResponse,
  type SignalResponse,
} from './schemas.js';

export {
  failureRecord,
  failedReply,
  describeFailure,
  type NodeId,
  type QueryType,
  type QueryRequest,
  type SignalRequest,
  type CoreOperation,
  type CallOptions,
  type TransportFailure,
  type TransportFailureKind,
  type CoreResponseRecord,
  type CoreReply,
  type CoreEdge,
  type GraphStatus,
  type StageInfo,
} from './types.js';
