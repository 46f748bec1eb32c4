export {
  parseGroundedResult,
  queryRecord,
  recordFromResult,
} from './parser.js';

export {
  FULL_CONFIDENCE,
  type Artifact,
  type GroundedResult,
  type SubgraphEdge,
} from './types.js';
