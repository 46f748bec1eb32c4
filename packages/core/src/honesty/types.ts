/**
 * Honesty Protocol Types
 *
 * The three kinds of statement a response may carry, and the outcome of one
 * verification cycle.
 */

import type { NodeId } from '../transport/types.js';

export type VerificationStatus = 'VERIFIED' | 'PARTIAL' | 'UNVERIFIED';

export const VERIFICATION_STATUSES: readonly VerificationStatus[] = ['VERIFIED', 'PARTIAL', 'UNVERIFIED'];

/** A claim the Core confirmed */
export interface Fact {
  readonly statement: string;
  readonly evidencePath: readonly NodeId[];
}

/** A claim with partial graph support */
export interface Inference {
  readonly statement: string;
  /** Integer in [0, 100], clamped when the inference is added */
  readonly confidence: number;
  readonly reasoning: string;
}

/** An explicit refusal to assert */
export interface Unknown {
  readonly query: string;
  readonly explanation: string;
}

export const HIGH_CONFIDENCE_THRESHOLD = 70;
export const LOW_CONFIDENCE_THRESHOLD = 50;

export function isHighConfidence(inference: Inference): boolean {
  return inference.confidence >= HIGH_CONFIDENCE_THRESHOLD;
}

export function isLowConfidence(inference: Inference): boolean {
  return inference.confidence < LOW_CONFIDENCE_THRESHOLD;
}

export type ConfidenceBand = 'high' | 'moderate' | 'low';

export function confidenceBand(inference: Inference): ConfidenceBand {
  if (isHighConfidence(inference)) {
    return 'high';
  }
  return isLowConfidence(inference) ? 'low' : 'moderate';
}

export function formatFact(fact: Fact): string {
  const path = fact.evidencePath.length > 0 ? fact.evidencePath.join(' -> ') : 'no path';
  return `[FACT] ${fact.statement} [path: ${path}]`;
}

export function formatInference(inference: Inference): string {
  return `[INFERENCE] ${inference.statement} [${inference.confidence}% confidence]`;
}

export function formatUnknown(unknown: Unknown): string {
  return `[UNKNOWN] ${unknown.query}: ${unknown.explanation}`;
}
