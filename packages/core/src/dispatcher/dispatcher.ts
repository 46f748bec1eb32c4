/**
 * Command Dispatcher
 *
 * Routes one line of the command grammar to the client and turns the outcome
 * into a HonestResponse. lookup, traverse and path are hypotheses and go
 * through the classifier (and so into the audit trail); ingest, status and
 * stage are direct reads or writes and report a Fact or an Unknown straight
 * away.
 *
 * `dispatch` never rejects: bad syntax, rejected parameters and unexpected
 * faults all come back as an Unknown entry.
 */

import type { GroundingClient } from '../client/core-client.js';
import { groundedOrAbsent } from '../client/replies.js';
import type { GroundedResult } from '../grounding/types.js';
import type { HonestyClassifier } from '../honesty/classifier.js';
import { HonestResponse } from '../honesty/honest-response.js';
import { describeFailure, type CoreOperation, type CoreReply } from '../transport/types.js';
import { ValidationError, wrapError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { parseCommand, type Command } from './grammar.js';

export function lookupHypothesis(entityId: number): string {
  return `Entity ${entityId} exists in the graph`;
}

export function traverseHypothesis(startNode: number, depth: number): string {
  return `Node ${startNode} has connections within depth ${depth}`;
}

export function pathHypothesis(start: number, end: number): string {
  return `A path exists from ${start} to ${end}`;
}

export class CommandDispatcher {
  private readonly client: GroundingClient;
  private readonly classifier: HonestyClassifier;
  private readonly logger: Logger;

  constructor(
    client: GroundingClient,
    classifier: HonestyClassifier,
    options: { logger?: Logger } = {}
  ) {
    this.client = client;
    this.classifier = classifier;
    this.logger = options.logger ?? getLogger('dispatcher');
  }

  async dispatch(line: string): Promise<HonestResponse> {
    const command = parseCommand(line);

    try {
      return await this.route(command);
    } catch (error) {
      if (error instanceof ValidationError) {
        return new HonestResponse().addUnknown(line.trim(), error.message);
      }
      const wrapped = wrapError(error, { component: 'Dispatcher', operation: command.kind });
      this.logger.error('Command failed unexpectedly', wrapped, { command: command.kind });
      return new HonestResponse().addUnknown(line.trim(), `Internal error: ${wrapped.message}`);
    }
  }

  private async route(command: Command): Promise<HonestResponse> {
    switch (command.kind) {
      case 'invalid':
        return new HonestResponse().addUnknown(command.query, command.explanation);

      case 'lookup':
        return this.verify(
          lookupHypothesis(command.entityId),
          'lookup',
          await this.client.lookup(command.entityId)
        );

      case 'traverse':
        return this.verify(
          traverseHypothesis(command.startNode, command.depth),
          'traverse',
          await this.client.traverse(command.startNode, command.depth)
        );

      case 'path':
        return this.verify(
          pathHypothesis(command.start, command.end),
          'strongest_path',
          await this.client.strongestPath(command.start, command.end)
        );

      case 'ingest':
        return this.ingest(command.entityId, command.attribute, command.value);

      case 'status':
        return this.status();

      case 'stage':
        return this.stage();
    }
  }

  private verify(
    hypothesis: string,
    queryType: CoreOperation,
    reply: CoreReply<GroundedResult>
  ): HonestResponse {
    const { response } = this.classifier.verify(hypothesis, groundedOrAbsent(reply), {
      queryType,
      coreResponse: reply.record,
    });
    return response;
  }

  private async ingest(entityId: number, attribute: string, value: string): Promise<HonestResponse> {
    const reply = await this.client.ingestSignal(entityId, attribute, value);
    const response = new HonestResponse();

    if (reply.ok) {
      return response.addFact(
        `Signal ingested: entity=${entityId}, attr=${attribute}, value=${value}`,
        [reply.value]
      );
    }
    return response.addUnknown(
      `ingest ${entityId} ${attribute}`,
      `Failed to ingest signal (${describeFailure(reply.failure)})`
    );
  }

  private async status(): Promise<HonestResponse> {
    const reply = await this.client.getStatus();
    const response = new HonestResponse();

    if (!reply.ok) {
      return response.addUnknown('status', 'Could not retrieve status');
    }
    const { node_count: nodes, edge_count: edges, stable_edges: stable } = reply.value;
    return response.addFact(`Graph: ${nodes} nodes, ${edges} edges, ${stable} stable`);
  }

  private async stage(): Promise<HonestResponse> {
    const reply = await this.client.getStage();
    const response = new HonestResponse();

    if (!reply.ok) {
      return response.addUnknown('stage', 'Could not retrieve stage');
    }
    const { stage, name, progress_percent: progress } = reply.value;
    return response.addFact(`Stage ${stage}: ${name} (${progress}% to next)`);
  }
}
