/**
 * Options and session plumbing shared by every command
 */

import type { ClientMode, HonestySession, SessionOptions } from '@groundcheck/core';
import { toClientOptions, type Config } from '@repo/shared-config';
import { CliError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

/** Options accepted on the root program */
export type GlobalOptions = {
  server?: string;
  timeout?: number;
  mode?: ClientMode;
  json?: boolean;
  verbose?: boolean;
};

export type SessionOpener = (options: SessionOptions) => Promise<HonestySession>;

/** What a command needs from the process around it */
export interface CommandContext {
  config: Config;
  logger: Logger;
  /** Color statement tags in text output */
  colors: boolean;
  openSession: SessionOpener;
}

/**
 * Command-line flags win over configuration
 */
export function resolveSessionOptions(options: GlobalOptions, config: Config): SessionOptions {
  const settings = toClientOptions(config);
  return {
    ...settings,
    ...(options.server !== undefined ? { baseUrl: options.server } : {}),
    ...(options.timeout !== undefined ? { timeoutMs: options.timeout } : {}),
    ...(options.mode !== undefined ? { mode: options.mode } : {}),
  };
}

/**
 * Open a session and require the Core to answer its health check
 */
export async function connectSession(options: GlobalOptions, context: CommandContext): Promise<HonestySession> {
  const sessionOptions = resolveSessionOptions(options, context.config);
  const session = await context.openSession(sessionOptions);

  if (!session.isConnected) {
    session.close();
    throw CliError.fromCode('CORE_UNREACHABLE', `Could not connect to the Core at ${session.client.baseUrl}`);
  }

  context.logger.debug(`Connected to ${session.client.baseUrl} (${session.client.mode} client)`);
  return session;
}
