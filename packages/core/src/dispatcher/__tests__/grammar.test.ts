/**
 * Tests for the command grammar
 */

import { describe, it, expect } from 'vitest';
import { parseCommand, unquote } from '../grammar.js';

describe('parseCommand', () => {
  it('should report empty input', () => {
    const expected = { kind: 'invalid', query: 'Empty query', explanation: 'No query provided' };
    expect(parseCommand('')).toEqual(expected);
    expect(parseCommand('   \t ')).toEqual(expected);
  });

  it('should match the command word case-insensitively', () => {
    expect(parseCommand('LOOKUP 7')).toEqual({ kind: 'lookup', entityId: 7 });
    expect(parseCommand('  Status  ')).toEqual({ kind: 'status' });
    expect(parseCommand('sTaGe')).toEqual({ kind: 'stage' });
  });

  describe('lookup', () => {
    it('should parse the entity id', () => {
      expect(parseCommand('lookup 12')).toEqual({ kind: 'lookup', entityId: 12 });
    });

    it('should reject a non-numeric id', () => {
      expect(parseCommand('lookup abc')).toEqual({ kind: 'invalid', query: 'lookup abc', explanation: 'Invalid entity ID' });
      expect(parseCommand('lookup 1.5')).toEqual({ kind: 'invalid', query: 'lookup 1.5', explanation: 'Invalid entity ID' });
    });

    it('should leave range checks to the transport', () => {
      expect(parseCommand('lookup -4')).toEqual({ kind: 'lookup', entityId: -4 });
    });

    it('should treat a missing id as invalid syntax', () => {
      expect(parseCommand('lookup')).toEqual({
        kind: 'invalid',
        query: 'lookup',
        explanation: 'Unknown command or invalid syntax',
      });
    });
  });

  describe('traverse', () => {
    it('should default the depth to 3', () => {
      expect(parseCommand('traverse 1')).toEqual({ kind: 'traverse', startNode: 1, depth: 3 });
    });

    it('should parse an explicit depth', () => {
      expect(parseCommand('traverse 1 7')).toEqual({ kind: 'traverse', startNode: 1, depth: 7 });
    });

    it('should reject a non-numeric depth', () => {
      expect(parseCommand('traverse 1 abc')).toEqual({
        kind: 'invalid',
        query: 'traverse 1 abc',
        explanation: 'Invalid depth value',
      });
    });

    it('should reject a non-numeric node id', () => {
      expect(parseCommand('traverse x 2')).toEqual({ kind: 'invalid', query: 'traverse x', explanation: 'Invalid node ID' });
    });
  });

  describe('path', () => {
    it('should parse both endpoints', () => {
      expect(parseCommand('path 1 3')).toEqual({ kind: 'path', start: 1, end: 3 });
    });

    it('should reject non-numeric endpoints', () => {
      expect(parseCommand('path 1 b')).toEqual({ kind: 'invalid', query: 'path 1 b', explanation: 'Invalid node IDs' });
    });

    it('should require two endpoints', () => {
      expect(parseCommand('path 1')).toMatchObject({ kind: 'invalid', explanation: 'Unknown command or invalid syntax' });
    });
  });

  describe('ingest', () => {
    it('should strip one layer of surrounding quotes from the value', () => {
      expect(parseCommand("ingest 1 name 'Alice'")).toEqual({
        kind: 'ingest',
        entityId: 1,
        attribute: 'name',
        value: 'Alice',
      });
      expect(parseCommand('ingest 1 name "\'Bob\'"')).toMatchObject({ value: "'Bob'" });
    });

    it('should take the rest of the line as the value', () => {
      expect(parseCommand('ingest 3 bio  "likes   long walks"')).toMatchObject({ value: 'likes   long walks' });
      expect(parseCommand('ingest 3 name Alice Smith')).toMatchObject({ value: 'Alice Smith' });
    });

    it('should keep unbalanced quotes', () => {
      expect(parseCommand("ingest 3 note 'open")).toMatchObject({ value: "'open" });
    });

    it('should reject a non-numeric entity id', () => {
      expect(parseCommand('ingest x name Alice')).toEqual({
        kind: 'invalid',
        query: 'ingest x',
        explanation: 'Invalid entity ID',
      });
    });

    it('should require a value', () => {
      expect(parseCommand('ingest 1 name')).toMatchObject({ kind: 'invalid', explanation: 'Unknown command or invalid syntax' });
    });
  });

  it('should report unknown commands', () => {
    expect(parseCommand('intersect 1 2')).toEqual({
      kind: 'invalid',
      query: 'intersect 1 2',
      explanation: 'Unknown command or invalid syntax',
    });
  });
});

describe('unquote', () => {
  it('should strip a matching pair only', () => {
    expect(unquote('"x"')).toBe('x');
    expect(unquote("'x'")).toBe('x');
    expect(unquote('"x\'')).toBe('"x\'');
    expect(unquote('""')).toBe('');
    expect(unquote('"')).toBe('"');
  });
});
