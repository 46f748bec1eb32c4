/**
 * Command grammar
 *
 *   lookup <id>
 *   traverse <id> [depth]
 *   path <start> <end>
 *   ingest <id> <attribute> <value...>
 *   status
 *   stage
 *
 * The command word is case-insensitive. Parsing never throws; input that
 * does not fit the grammar becomes an `invalid` command carrying the Unknown
 * to report.
 */

import { DEFAULT_DEPTH } from '../transport/requests.js';
import type { NodeId } from '../transport/types.js';

export type Command =
  | { kind: 'lookup'; entityId: NodeId }
  | { kind: 'traverse'; startNode: NodeId; depth: number }
  | { kind: 'path'; start: NodeId; end: NodeId }
  | { kind: 'ingest'; entityId: NodeId; attribute: string; value: string }
  | { kind: 'status' }
  | { kind: 'stage' }
  | { kind: 'invalid'; query: string; explanation: string };

export const COMMAND_HELP: readonly (readonly [usage: string, description: string])[] = [
  ['lookup <id>', 'Check that an entity exists'],
  ['traverse <id> [depth]', `Check for connections (default depth ${DEFAULT_DEPTH})`],
  ['path <start> <end>', 'Check for a path between two nodes'],
  ['ingest <id> <attr> <value>', 'Ingest a signal'],
  ['status', 'Show graph status'],
  ['stage', 'Show developmental stage'],
];

const INTEGER = /^[+-]?\d+$/;

function parseInteger(token: string): number | null {
  return INTEGER.test(token) ? Number(token) : null;
}

function invalid(query: string, explanation: string): Command {
  return { kind: 'invalid', query, explanation };
}

/**
 * Strip one matching pair of surrounding quotes
 */
export function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Text after the first `count` whitespace-separated tokens, inner spacing kept
 */
function remainderAfter(line: string, count: number): string {
  const match = new RegExp(`^(?:\\S+\\s+){${count}}`).exec(line);
  return match ? line.slice(match[0].length) : '';
}

export function parseCommand(input: string): Command {
  const line = input.trim();
  const parts = line.split(/\s+/).filter((part) => part.length > 0);

  const [word, first, second] = parts;
  if (word === undefined) {
    return invalid('Empty query', 'No query provided');
  }

  switch (word.toLowerCase()) {
    case 'lookup': {
      if (first === undefined) break;
      const entityId = parseInteger(first);
      return entityId === null
        ? invalid(`lookup ${first}`, 'Invalid entity ID')
        : { kind: 'lookup', entityId };
    }

    case 'traverse': {
      if (first === undefined) break;
      const depth = second === undefined ? DEFAULT_DEPTH : parseInteger(second);
      if (depth === null) {
        return invalid(line, 'Invalid depth value');
      }
      const startNode = parseInteger(first);
      return startNode === null
        ? invalid(`traverse ${first}`, 'Invalid node ID')
        : { kind: 'traverse', startNode, depth };
    }

    case 'path': {
      if (first === undefined || second === undefined) break;
      const start = parseInteger(first);
      const end = parseInteger(second);
      return start === null || end === null
        ? invalid(`path ${first} ${second}`, 'Invalid node IDs')
        : { kind: 'path', start, end };
    }

    case 'ingest': {
      if (first === undefined || second === undefined || parts.length < 4) break;
      const entityId = parseInteger(first);
      if (entityId === null) {
        return invalid(`ingest ${first}`, 'Invalid entity ID');
      }
      return {
        kind: 'ingest',
        entityId,
        attribute: second,
        value: unquote(remainderAfter(line, 3)),
      };
    }

    case 'status':
      return { kind: 'status' };

    case 'stage':
      return { kind: 'stage' };
  }

  return invalid(line, 'Unknown command or invalid syntax');
}
