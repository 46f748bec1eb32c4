/**
 * HonestySession wires one client, one audit trail, one classifier and one
 * dispatcher together for the lifetime of an interactive session.
 */

import { createCoreClient, type ClientMode, type CoreClientOptions, type GroundingClient } from './client/core-client.js';
import { CommandDispatcher } from './dispatcher/dispatcher.js';
import { createAuditTrail, type AuditSummary, type AuditTrail } from './honesty/audit-trail.js';
import { HonestyClassifier } from './honesty/classifier.js';
import type { HonestResponse } from './honesty/honest-response.js';
import { getLogger, type Logger } from './utils/logger.js';

export interface SessionOptions extends CoreClientOptions {
  mode?: ClientMode;
  /** Share a trail across sessions; a fresh one is created otherwise */
  auditTrail?: AuditTrail;
  /** Use an existing client instead of building one from the options */
  client?: GroundingClient;
}

export class HonestySession {
  readonly client: GroundingClient;
  readonly auditTrail: AuditTrail;
  readonly classifier: HonestyClassifier;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: SessionOptions = {}) {
    const { client, auditTrail, ...clientOptions } = options;
    this.logger = options.logger ?? getLogger('session');
    this.client = client ?? createCoreClient(clientOptions);
    this.auditTrail = auditTrail ?? createAuditTrail();
    this.classifier = new HonestyClassifier(this.auditTrail, { logger: this.logger.child('classifier') });
    this.dispatcher = new CommandDispatcher(this.client, this.classifier, {
      logger: this.logger.child('dispatcher'),
    });
  }

  /**
   * Build a session and check the Core's health. The session is returned even when
   * the check fails; its commands then answer with Unknown entries.
   */
  static async open(options: SessionOptions = {}): Promise<HonestySession> {
    const session = new HonestySession(options);
    await session.connect();
    return session;
  }

  async connect(): Promise<boolean> {
    const ready = await this.logger.timed('Health check', () => this.client.start(), {
      baseUrl: this.client.baseUrl,
    });
    if (ready) {
      this.logger.info('Connected to Core', { baseUrl: this.client.baseUrl, mode: this.client.mode });
    }
    return ready;
  }

  get isConnected(): boolean {
    return this.client.isReady;
  }

  ask(line: string): Promise<HonestResponse> {
    return this.dispatcher.dispatch(line);
  }

  summary(): AuditSummary {
    return this.auditTrail.getSummary();
  }

  /**
   * Stop the client and return the final audit summary. Idempotent.
   */
  close(): AuditSummary {
    if (!this.closed) {
      this.closed = true;
      this.client.stop();
      this.logger.debug('Session closed', { ...this.auditTrail.getSummary() });
    }
    return this.auditTrail.getSummary();
  }
}
