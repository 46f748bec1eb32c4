/**
 * Status command - Show graph counts and developmental stage
 */

import { describeFailure } from '@groundcheck/core';
import { renderStatus } from '../ui/render.js';
import { connectSession, type CommandContext, type GlobalOptions } from './shared.js';

export async function statusCommand(options: GlobalOptions, context: CommandContext): Promise<void> {
  const session = await connectSession(options, context);

  try {
    const [status, stage] = await Promise.all([session.client.getStatus(), session.client.getStage()]);

    if (!status.ok) {
      context.logger.debug(`Status unavailable: ${describeFailure(status.failure)}`);
    }
    if (!stage.ok) {
      context.logger.debug(`Stage unavailable: ${describeFailure(stage.failure)}`);
    }

    context.logger.log(
      renderStatus(
        session.client.baseUrl,
        status.ok ? status.value : null,
        stage.ok ? stage.value : null,
        { json: options.json }
      )
    );
  } finally {
    session.close();
  }
}
