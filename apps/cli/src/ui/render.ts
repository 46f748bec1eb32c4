/**
 * Terminal rendering for honest responses, audit summaries and Core status
 *
 * Every renderer returns a string; callers decide where it is written.
 *
 * @module ui/render
 */

import chalk from 'chalk';
import {
  COMMAND_HELP,
  confidenceBand,
  formatAuditSummary,
  type AuditSummary,
  type ConfidenceBand,
  type GraphStatus,
  type HonestResponse,
  type StageInfo,
} from '@groundcheck/core';

export interface RenderOptions {
  /** Emit JSON instead of text */
  json?: boolean;
  /** Color statement tags */
  colors?: boolean;
}

/** Commands the REPL handles itself rather than sending to the Core */
export const META_COMMANDS: readonly (readonly [usage: string, description: string])[] = [
  ['audit', 'Show audit summary'],
  ['help', 'Show this help'],
  ['quit', 'Exit'],
];

type Paint = (text: string) => string;

const TAG_PAINT: readonly (readonly [tag: string, paint: Paint])[] = [
  ['[FACT]', chalk.green],
  ['[UNKNOWN]', chalk.red],
];

/** Inference tags take the color of their confidence band */
const BAND_PAINT: Record<ConfidenceBand, Paint> = {
  high: chalk.cyan,
  moderate: chalk.yellow,
  low: chalk.magenta,
};

const INFERENCE_TAG = '[INFERENCE]';

export function renderResponse(response: HonestResponse, options: RenderOptions = {}): string {
  if (options.json) {
    return JSON.stringify(response.toJSON(), null, 2);
  }

  let text = response.toText();
  if (options.colors) {
    for (const [tag, paint] of TAG_PAINT) {
      text = text.split(tag).join(paint(tag));
    }
    // Inference lines appear in insertion order, one tag each
    const bands = response.inferences.map(confidenceBand);
    let index = 0;
    text = text.split(INFERENCE_TAG).reduce((painted, part) => {
      const band = bands[index++] ?? 'moderate';
      return `${painted}${BAND_PAINT[band](INFERENCE_TAG)}${part}`;
    });
  }
  return text;
}

export function renderAuditSummary(summary: AuditSummary, options: RenderOptions = {}): string {
  if (options.json) {
    return JSON.stringify(summary, null, 2);
  }

  const body = formatAuditSummary(summary)
    .split('\n')
    .map((line) => `  ${line}`);
  return ['Audit Summary:', ...body].join('\n');
}

export function renderHelp(): string {
  const rows = [...COMMAND_HELP, ...META_COMMANDS];
  const width = Math.max(...rows.map(([usage]) => usage.length));
  return ['Commands:', ...rows.map(([usage, description]) => `  ${usage.padEnd(width)}  - ${description}`)].join('\n');
}

/**
 * The first line a response states: its first fact, else its first unknown
 */
export function headline(response: HonestResponse): string {
  const [fact] = response.facts;
  if (fact) {
    return fact.statement;
  }
  const [unknown] = response.unknowns;
  return unknown ? `${unknown.query}: ${unknown.explanation}` : '';
}

export function renderStatus(
  server: string,
  status: GraphStatus | null,
  stage: StageInfo | null,
  options: RenderOptions = {}
): string {
  if (options.json) {
    return JSON.stringify({ server, status, stage }, null, 2);
  }

  const lines = [`Connected to: ${server}`];

  if (status) {
    lines.push(
      '',
      'Graph Status:',
      `  Nodes: ${status.node_count}`,
      `  Edges: ${status.edge_count}`,
      `  Stable Edges: ${status.stable_edges}`
    );
  }

  if (stage) {
    lines.push(
      '',
      'Developmental Stage:',
      `  Stage: ${stage.stage}`,
      `  Name: ${stage.name}`,
      `  Progress: ${stage.progress_percent}%`
    );
  }

  return lines.join('\n');
}
