/**
 * Tests for HonestResponse
 */

import { describe, it, expect } from 'vitest';
import { clampConfidence, HonestResponse } from '../honest-response.js';

const BORDER = `+${'-'.repeat(37)}+`;

describe('clampConfidence', () => {
  it('should clamp values below zero to 0', () => {
    expect(clampConfidence(-1)).toBe(0);
    expect(clampConfidence(-500)).toBe(0);
    expect(clampConfidence(Number.NEGATIVE_INFINITY)).toBe(0);
  });

  it('should clamp values above one hundred to 100', () => {
    expect(clampConfidence(101)).toBe(100);
    expect(clampConfidence(1e9)).toBe(100);
    expect(clampConfidence(Number.POSITIVE_INFINITY)).toBe(100);
  });

  it('should round fractional values and map NaN to 0', () => {
    expect(clampConfidence(49.5)).toBe(50);
    expect(clampConfidence(12.2)).toBe(12);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });

  it('should keep in-range integers unchanged', () => {
    for (const value of [0, 1, 50, 99, 100]) {
      expect(clampConfidence(value)).toBe(value);
    }
  });
});

describe('HonestResponse', () => {
  describe('add methods', () => {
    it('should clamp inference confidence on write', () => {
      const response = new HonestResponse()
        .addInference('too high', 150, 'r')
        .addInference('too low', -20, 'r');

      expect(response.inferences.map((inference) => inference.confidence)).toEqual([100, 0]);
    });

    it('should keep insertion order within each category', () => {
      const response = new HonestResponse()
        .addFact('first', [1])
        .addUnknown('q1', 'e1')
        .addFact('second')
        .addUnknown('q2', 'e2');

      expect(response.facts.map((fact) => fact.statement)).toEqual(['first', 'second']);
      expect(response.unknowns.map((unknown) => unknown.query)).toEqual(['q1', 'q2']);
    });

    it('should copy the evidence path so later caller edits do not leak in', () => {
      const path = [1, 2];
      const response = new HonestResponse().addFact('claim', path);
      path.push(3);

      expect(response.facts[0]?.evidencePath).toEqual([1, 2]);
    });

    it('should freeze stored entries', () => {
      const response = new HonestResponse().addFact('claim', [1]).addUnknown('q', 'e');

      expect(Object.isFrozen(response.facts[0])).toBe(true);
      expect(Object.isFrozen(response.facts[0]?.evidencePath)).toBe(true);
      expect(Object.isFrozen(response.unknowns[0])).toBe(true);
    });
  });

  describe('isEmpty', () => {
    it('should be true only when no category has entries', () => {
      expect(new HonestResponse().isEmpty()).toBe(true);
      expect(new HonestResponse().addUnknown('q', 'e').isEmpty()).toBe(false);
      expect(new HonestResponse().addInference('s', 10, 'r').isEmpty()).toBe(false);
    });
  });

  describe('merge', () => {
    it('should append the other response after existing entries', () => {
      const target = new HonestResponse().addFact('a', [1]);
      const other = new HonestResponse().addFact('b', [2]).addInference('c', 40, 'r');

      target.merge(other);

      expect(target.facts.map((fact) => fact.statement)).toEqual(['a', 'b']);
      expect(target.inferences).toHaveLength(1);
    });
  });

  describe('toText', () => {
    it('should render three headers and three placeholders when empty', () => {
      const lines = new HonestResponse().toText().split('\n');

      expect(lines).toEqual([
        BORDER,
        `| FACTS (confirmed by Core)${' '.repeat(10)} |`,
        `| - (none)${' '.repeat(27)} |`,
        BORDER,
        `| INFERENCES (partial evidence)${' '.repeat(6)} |`,
        `| - (none)${' '.repeat(27)} |`,
        BORDER,
        `| UNKNOWN (no grounding)${' '.repeat(13)} |`,
        `| - (none)${' '.repeat(27)} |`,
        BORDER,
      ]);
    });

    it('should render each entry in its textual form', () => {
      const text = new HonestResponse()
        .addFact('Entity 1 exists in the graph', [1, 2, 3])
        .addFact('Graph is up')
        .addInference('Maybe linked', 40, 'Partial evidence with 40% confidence')
        .addUnknown('lookup 9', 'No supporting structure in graph')
        .toText();

      const lines = text.split('\n');
      expect(lines).toContain('| - [FACT] Entity 1 exists in the graph [path: 1 -> 2 -> 3]');
      expect(lines).toContain('| - [FACT] Graph is up [path: no path]');
      expect(lines).toContain('| - [INFERENCE] Maybe linked [40% confidence]');
      expect(lines).toContain('| - [UNKNOWN] lookup 9: No supporting structure in graph');
      expect(text).not.toContain('(none)');
    });

    it('should pad short entries to the box width', () => {
      const lines = new HonestResponse().addUnknown('q', 'e').toText().split('\n');

      // "- [UNKNOWN] q: e" is 16 characters
      expect(lines[8]).toBe(`| - [UNKNOWN] q: e${' '.repeat(19)} |`);
    });

    it('should be deterministic', () => {
      const build = () => new HonestResponse().addFact('x', [4]).addInference('y', 55, 'r').toText();
      expect(build()).toBe(build());
    });
  });

  describe('toJSON', () => {
    it('should expose the three categories as plain arrays', () => {
      const json = new HonestResponse().addFact('x', [4]).addUnknown('q', 'e').toJSON();

      expect(json).toEqual({
        facts: [{ statement: 'x', evidencePath: [4] }],
        inferences: [],
        unknowns: [{ query: 'q', explanation: 'e' }],
      });
    });
  });
});
