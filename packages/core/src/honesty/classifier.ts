/**
 * Honesty Classifier
 *
 * One-shot classification of a hypothesis against a grounding outcome:
 *
 *   absent                    -> UNVERIFIED, one Unknown
 *   verified with a path      -> VERIFIED,   one Fact
 *   anything else             -> PARTIAL,    one Inference
 *
 * A missing result is the expected "no evidence" path, not an error.
 */

import { recordFromResult } from '../grounding/parser.js';
import type { GroundedResult } from '../grounding/types.js';
import type { CoreResponseRecord } from '../transport/types.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { AuditTrail } from './audit-trail.js';
import { clampConfidence, HonestResponse } from './honest-response.js';
import type { VerificationStatus } from './types.js';

export const NO_STRUCTURE_EXPLANATION = 'No supporting structure in graph';

/** Query tag recorded when the caller does not name one */
export const DEFAULT_QUERY_TYPE = 'verify';

export interface Classification {
  status: VerificationStatus;
  response: HonestResponse;
}

export interface VerifyTrace {
  /** Audit tag, usually the Core query kind */
  queryType?: string;
  /** What the Core answered; derived from the result when omitted */
  coreResponse?: CoreResponseRecord;
}

export function partialReasoning(confidence: number): string {
  return `Partial evidence with ${confidence}% confidence`;
}

/**
 * Pure classification with no side effects
 */
export function classifyHypothesis(
  hypothesis: string,
  result: GroundedResult | null
): Classification {
  const response = new HonestResponse();

  if (result === null) {
    response.addUnknown(hypothesis, NO_STRUCTURE_EXPLANATION);
    return { status: 'UNVERIFIED', response };
  }

  // A fact needs a Core-confirmed path; a bare verified flag is not enough.
  if (result.verified && result.evidencePath.length > 0) {
    response.addFact(hypothesis, result.evidencePath);
    return { status: 'VERIFIED', response };
  }

  const confidence = clampConfidence(result.confidence);
  const reasoning = result.verified
    ? `${partialReasoning(confidence)}; marked verified without an evidence path, so not stated as fact`
    : partialReasoning(confidence);
  response.addInference(hypothesis, confidence, reasoning);
  return { status: 'PARTIAL', response };
}

export class HonestyClassifier {
  private readonly audit: AuditTrail;
  private readonly logger: Logger;

  constructor(audit: AuditTrail, options: { logger?: Logger } = {}) {
    this.audit = audit;
    this.logger = options.logger ?? getLogger('classifier');
  }

  get auditTrail(): AuditTrail {
    return this.audit;
  }

  /**
   * Classify and append exactly one cycle to the audit trail
   */
  verify(
    hypothesis: string,
    result: GroundedResult | null,
    trace: VerifyTrace = {}
  ): Classification {
    const classification = classifyHypothesis(hypothesis, result);

    this.audit.log({
      hypothesis,
      queryType: trace.queryType ?? DEFAULT_QUERY_TYPE,
      coreResponse: trace.coreResponse ?? recordFromResult(result),
      status: classification.status,
      evidencePath: result?.evidencePath ?? [],
    });

    this.logger.debug('Hypothesis classified', {
      hypothesis,
      status: classification.status,
      queryType: trace.queryType ?? DEFAULT_QUERY_TYPE,
    });

    return classification;
  }
}
