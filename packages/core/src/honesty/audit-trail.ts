/**
 * Audit Trail
 *
 * Append-only record of every verification cycle, with summary statistics.
 *
 * Exclusion: every method is synchronous and touches only memory, so each
 * one runs to completion on the event loop before any other caller resumes.
 * No method awaits, which keeps writes and summary reads from interleaving
 * no matter how many queries are in flight.
 */

import type { CoreResponseRecord, NodeId } from '../transport/types.js';
import { deepFreeze } from '../utils/validation.js';
import type { VerificationStatus } from './types.js';

export interface VerificationCycle {
  /** ISO-8601 time the cycle was logged */
  readonly timestamp: string;
  readonly hypothesis: string;
  readonly queryType: string;
  readonly coreResponse: CoreResponseRecord;
  readonly status: VerificationStatus;
  readonly evidencePath: readonly NodeId[];
}

export interface AuditEntryInput {
  hypothesis: string;
  queryType: string;
  coreResponse: CoreResponseRecord;
  status: VerificationStatus;
  evidencePath?: readonly NodeId[];
}

export interface AuditSummary {
  total: number;
  verifiedCount: number;
  unverifiedCount: number;
  partialCount: number;
  /** verifiedCount / total, or 0 when nothing was logged */
  verificationRate: number;
}

export class AuditTrail {
  private cycles: VerificationCycle[] = [];
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  log(entry: AuditEntryInput): VerificationCycle {
    const cycle: VerificationCycle = deepFreeze({
      timestamp: this.now().toISOString(),
      hypothesis: entry.hypothesis,
      queryType: entry.queryType,
      coreResponse: structuredClone(entry.coreResponse),
      status: entry.status,
      evidencePath: [...(entry.evidencePath ?? [])],
    });
    this.cycles.push(cycle);
    return cycle;
  }

  getSummary(): AuditSummary {
    let verifiedCount = 0;
    let unverifiedCount = 0;
    let partialCount = 0;

    for (const cycle of this.cycles) {
      switch (cycle.status) {
        case 'VERIFIED':
          verifiedCount++;
          break;
        case 'UNVERIFIED':
          unverifiedCount++;
          break;
        case 'PARTIAL':
          partialCount++;
          break;
      }
    }

    const total = this.cycles.length;
    return {
      total,
      verifiedCount,
      unverifiedCount,
      partialCount,
      verificationRate: total > 0 ? verifiedCount / total : 0,
    };
  }

  /**
   * Snapshot of the logged cycles, oldest first
   */
  entries(): readonly VerificationCycle[] {
    return [...this.cycles];
  }

  get size(): number {
    return this.cycles.length;
  }

  clear(): void {
    this.cycles = [];
  }
}

export function createAuditTrail(options: { now?: () => Date } = {}): AuditTrail {
  return new AuditTrail(options);
}

let defaultAuditTrail: AuditTrail | null = null;

/**
 * Process-wide trail for callers that want one log per process. Components
 * never reach for it themselves; it has to be passed in.
 */
export function getDefaultAuditTrail(): AuditTrail {
  if (!defaultAuditTrail) {
    defaultAuditTrail = new AuditTrail();
  }
  return defaultAuditTrail;
}

/**
 * Plain-text summary block used by the CLI and session close
 */
export function formatAuditSummary(summary: AuditSummary): string {
  const lines = [
    `Total queries: ${summary.total}`,
    `Verified: ${summary.verifiedCount}`,
    `Unverified: ${summary.unverifiedCount}`,
    `Partial: ${summary.partialCount}`,
  ];
  if (summary.total > 0) {
    lines.push(`Verification rate: ${(summary.verificationRate * 100).toFixed(1)}%`);
  }
  return lines.join('\n');
}
