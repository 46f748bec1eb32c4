/**
 * HonestResponse
 *
 * Append-only accumulator of facts, inferences and unknowns for one query.
 * Entries are frozen on insertion and rendered in insertion order.
 */

import type { NodeId } from '../transport/types.js';
import {
  formatFact,
  formatInference,
  formatUnknown,
  type Fact,
  type Inference,
  type Unknown,
} from './types.js';

/** Characters between the corner marks of a section border */
const INNER_WIDTH = 37;

const SECTION_TITLES = {
  facts: 'FACTS (confirmed by Core)',
  inferences: 'INFERENCES (partial evidence)',
  unknowns: 'UNKNOWN (no grounding)',
} as const;

export interface HonestResponseJSON {
  facts: Fact[];
  inferences: Inference[];
  unknowns: Unknown[];
}

/**
 * Round to an integer and clamp into [0, 100]. NaN becomes 0.
 */
export function clampConfidence(confidence: number): number {
  if (Number.isNaN(confidence)) {
    return 0;
  }
  return Math.max(0, Math.min(100, Math.round(confidence)));
}

export class HonestResponse {
  private readonly factList: Fact[] = [];
  private readonly inferenceList: Inference[] = [];
  private readonly unknownList: Unknown[] = [];

  get facts(): readonly Fact[] {
    return this.factList;
  }

  get inferences(): readonly Inference[] {
    return this.inferenceList;
  }

  get unknowns(): readonly Unknown[] {
    return this.unknownList;
  }

  addFact(statement: string, evidencePath: readonly NodeId[] = []): this {
    this.factList.push(Object.freeze({
      statement,
      evidencePath: Object.freeze([...evidencePath]),
    }));
    return this;
  }

  addInference(statement: string, confidence: number, reasoning: string): this {
    this.inferenceList.push(Object.freeze({
      statement,
      confidence: clampConfidence(confidence),
      reasoning,
    }));
    return this;
  }

  addUnknown(query: string, explanation: string): this {
    this.unknownList.push(Object.freeze({ query, explanation }));
    return this;
  }

  /**
   * Append every entry of another response, keeping its order
   */
  merge(other: HonestResponse): this {
    this.factList.push(...other.facts);
    this.inferenceList.push(...other.inferences);
    this.unknownList.push(...other.unknowns);
    return this;
  }

  isEmpty(): boolean {
    return this.factList.length === 0
      && this.inferenceList.length === 0
      && this.unknownList.length === 0;
  }

  toText(): string {
    const border = `+${'-'.repeat(INNER_WIDTH)}+`;
    const lines: string[] = [border];

    const section = (title: string, entries: string[]): void => {
      lines.push(boxed(title));
      if (entries.length === 0) {
        lines.push(boxed('- (none)'));
      } else {
        for (const entry of entries) {
          lines.push(boxed(`- ${entry}`));
        }
      }
      lines.push(border);
    };

    section(SECTION_TITLES.facts, this.factList.map(formatFact));
    section(SECTION_TITLES.inferences, this.inferenceList.map(formatInference));
    section(SECTION_TITLES.unknowns, this.unknownList.map(formatUnknown));

    return lines.join('\n');
  }

  toJSON(): HonestResponseJSON {
    return {
      facts: this.factList.map((fact) => ({ ...fact, evidencePath: [...fact.evidencePath] })),
      inferences: [...this.inferenceList],
      unknowns: [...this.unknownList],
    };
  }
}

/**
 * Pad a line to the box width. Entries wider than the box keep only the left
 * border.
 */
function boxed(text: string): string {
  const room = INNER_WIDTH - 2;
  return text.length <= room ? `| ${text.padEnd(room)} |` : `| ${text}`;
}
