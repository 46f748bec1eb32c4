/**
 * REPL command - Interactive grounding session
 *
 * Lines are read from a LineSource: @clack/prompts on an interactive terminal,
 * readline over piped input. `help`, `audit` and `quit` are handled here; every
 * other line goes to the session's dispatcher.
 */

import { createInterface } from 'node:readline';
import * as p from '@clack/prompts';
import type { HonestySession } from '@groundcheck/core';
import { headline, renderAuditSummary, renderHelp, renderResponse } from '../ui/render.js';
import { connectSession, type CommandContext, type GlobalOptions } from './shared.js';

export const PROMPT = 'groundcheck>';

const QUIT_WORDS = new Set(['quit', 'exit', 'q']);

export interface LineSource {
  /** Next line, or null once input has ended or the user cancelled */
  next(prompt: string): Promise<string | null>;
  close(): void;
}

export function promptLineSource(): LineSource {
  return {
    async next(prompt) {
      const value = await p.text({ message: prompt });
      if (p.isCancel(value)) {
        return null;
      }
      // clack yields undefined for an empty submission
      return typeof value === 'string' ? value : '';
    },
    close() {},
  };
}

export function streamLineSource(input: NodeJS.ReadableStream): LineSource {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async next() {
      const result = await lines.next();
      return result.done ? null : result.value;
    },
    close() {
      rl.close();
    },
  };
}

async function printBanner(session: HonestySession, context: CommandContext): Promise<void> {
  const { logger } = context;
  logger.success(`Connected to ${session.client.baseUrl} (${session.client.mode} client)`);

  for (const line of ['status', 'stage']) {
    logger.info(headline(await session.ask(line)));
  }
  logger.newline();
}

export async function replCommand(
  options: GlobalOptions,
  context: CommandContext,
  openSource: () => LineSource
): Promise<void> {
  const { logger } = context;
  const session = await connectSession(options, context);
  const source = openSource();
  const render = { json: options.json, colors: context.colors };

  try {
    await printBanner(session, context);
    logger.log(renderHelp());
    logger.newline();

    for (;;) {
      const line = await source.next(PROMPT);
      if (line === null) {
        break;
      }

      const input = line.trim();
      if (!input) {
        continue;
      }

      const word = input.toLowerCase();
      if (QUIT_WORDS.has(word)) {
        break;
      }
      if (word === 'help') {
        logger.log(renderHelp());
        continue;
      }
      if (word === 'audit') {
        logger.log(renderAuditSummary(session.summary(), render));
        continue;
      }

      logger.log(renderResponse(await session.ask(input), render));
      logger.newline();
    }
  } finally {
    source.close();
    const summary = session.close();
    if (summary.total > 0) {
      logger.log(renderAuditSummary(summary, render));
    }
  }
}
