/**
 * Config command - Show the resolved configuration with secrets redacted
 */

import { printConfig } from '@repo/shared-config';
import type { CommandContext, GlobalOptions } from './shared.js';

export async function configCommand(_options: GlobalOptions, context: CommandContext): Promise<void> {
  context.logger.debug('Configuration resolved from environment and .env files');
  printConfig(context.config);
}
