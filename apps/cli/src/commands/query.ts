/**
 * Query command - Run one line of the command grammar and print the answer
 */

import { renderResponse } from '../ui/render.js';
import { connectSession, type CommandContext, type GlobalOptions } from './shared.js';

export async function queryCommand(
  words: string[],
  options: GlobalOptions,
  context: CommandContext
): Promise<void> {
  const session = await connectSession(options, context);

  try {
    const response = await session.ask(words.join(' '));
    context.logger.log(renderResponse(response, { json: options.json, colors: context.colors }));
  } finally {
    session.close();
  }
}
