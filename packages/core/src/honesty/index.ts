/**
 * Honesty Protocol
 *
 * Classification of hypotheses into facts, inferences and unknowns, the
 * response accumulator that renders them, and the audit trail that records
 * every verification cycle.
 */

export {
  HonestyClassifier,
  classifyHypothesis,
  partialReasoning,
  NO_STRUCTURE_EXPLANATION,
  DEFAULT_QUERY_TYPE,
  type Classification,
  type VerifyTrace,
} from './classifier.js';

export {
  HonestResponse,
  clampConfidence,
  type HonestResponseJSON,
} from './honest-response.js';

export {
  AuditTrail,
  createAuditTrail,
  getDefaultAuditTrail,
  formatAuditSummary,
  type AuditEntryInput,
  type AuditSummary,
  type VerificationCycle,
} from './audit-trail.js';

export * from './types.js';
