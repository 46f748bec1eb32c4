/**
 * Core Clients
 *
 * One programmatic method per Core query kind. Both clients share request
 * validation, decoding and interpretation; they differ only in `schedule()`,
 * the point where a caller is suspended while its request runs:
 *
 * - `CoreClient` lets calls overlap; each caller waits only for its own
 *   request.
 * - `SerialCoreClient` admits one Core call at a time; later callers wait, in
 *   arrival order, until every earlier call has finished.
 *
 * Query methods validate their arguments before a promise is created, so bad
 * input throws a `ValidationError` synchronously and nothing is sent. Every
 * other outcome resolves to a `CoreReply`.
 */

import type { GroundedResult } from '../grounding/types.js';
import { HttpTransport, type TransportOptions } from '../transport/http-transport.js';
import {
  DEFAULT_DEPTH,
  intersectRequest,
  lookupRequest,
  relatedRequest,
  signalRequest,
  strongestPathRequest,
  traverseRequest,
} from '../transport/requests.js';
import {
  graphStatusSchema,
  queryResponseSchema,
  signalResponseSchema,
  stageInfoSchema,
  type GraphStatus,
  type StageInfo,
} from '../transport/schemas.js';
import type { CallOptions, CoreReply, NodeId, QueryRequest } from '../transport/types.js';
import { Semaphore } from '../utils/semaphore.js';
import { interpretQuery, interpretSignal, interpretStage, interpretStatus } from './replies.js';

export type ClientMode = 'concurrent' | 'serial';

export interface CoreClientOptions extends Partial<TransportOptions> {
  /** Use an existing transport instead of building one from the options */
  transport?: HttpTransport;
}

export abstract class GroundingClient {
  abstract readonly mode: ClientMode;
  protected readonly transport: HttpTransport;

  constructor(options: CoreClientOptions = {}) {
    const { transport, ...transportOptions } = options;
    this.transport = transport ?? new HttpTransport(transportOptions);
  }

  /**
   * Suspend the caller until `task` has run
   */
  protected abstract schedule<T>(task: () => Promise<T>): Promise<T>;

  get baseUrl(): string {
    return this.transport.baseUrl;
  }

  get isReady(): boolean {
    return this.transport.isReady;
  }

  /**
   * Check the Core's health; queries answer `NotStarted` until this succeeds
   */
  start(options?: CallOptions): Promise<boolean> {
    return this.schedule(() => this.transport.start(options));
  }

  stop(): void {
    this.transport.stop();
  }

  lookup(entityId: NodeId, options?: CallOptions): Promise<CoreReply<GroundedResult>> {
    return this.query(lookupRequest(entityId), options);
  }

  traverse(
    startNode: NodeId,
    depth: number = DEFAULT_DEPTH,
    options?: CallOptions
  ): Promise<CoreReply<GroundedResult>> {
    return this.query(traverseRequest(startNode, depth), options);
  }

  strongestPath(start: NodeId, end: NodeId, options?: CallOptions): Promise<CoreReply<GroundedResult>> {
    return this.query(strongestPathRequest(start, end), options);
  }

  /**
   * Nodes connected to every input node
   */
  intersect(nodes: readonly NodeId[], options?: CallOptions): Promise<CoreReply<GroundedResult>> {
    return this.query(intersectRequest(nodes), options);
  }

  /**
   * Subgraph reachable from a node within `depth` hops
   */
  related(
    nodeId: NodeId,
    depth: number = DEFAULT_DEPTH,
    options?: CallOptions
  ): Promise<CoreReply<GroundedResult>> {
    return this.query(relatedRequest(nodeId, depth), options);
  }

  /**
   * Resolves to the id of the node the Core created or matched
   */
  ingestSignal(
    entityId: NodeId,
    attribute: string,
    value: string,
    options?: CallOptions
  ): Promise<CoreReply<NodeId>> {
    const body = signalRequest(entityId, attribute, value);
    return this.schedule(() =>
      this.transport.send(
        { method: 'POST', path: '/signal', body, schema: signalResponseSchema, operation: 'signal' },
        options
      )
    ).then(interpretSignal);
  }

  getStatus(options?: CallOptions): Promise<CoreReply<GraphStatus>> {
    return this.schedule(() =>
      this.transport.send(
        { method: 'GET', path: '/status', schema: graphStatusSchema, operation: 'status' },
        options
      )
    ).then(interpretStatus);
  }

  getStage(options?: CallOptions): Promise<CoreReply<StageInfo>> {
    return this.schedule(() =>
      this.transport.send(
        { method: 'GET', path: '/stage', schema: stageInfoSchema, operation: 'stage' },
        options
      )
    ).then(interpretStage);
  }

  private query(request: QueryRequest, options?: CallOptions): Promise<CoreReply<GroundedResult>> {
    return this.schedule(() =>
      this.transport.send(
        { method: 'POST', path: '/query', body: request, schema: queryResponseSchema, operation: request.type },
        options
      )
    ).then(interpretQuery);
  }
}

export class CoreClient extends GroundingClient {
  readonly mode = 'concurrent' as const;

  protected schedule<T>(task: () => Promise<T>): Promise<T> {
    return task();
  }
}

export class SerialCoreClient extends GroundingClient {
  readonly mode = 'serial' as const;
  private readonly gate = new Semaphore(1);

  protected schedule<T>(task: () => Promise<T>): Promise<T> {
    return this.gate.run(task);
  }
}

export function createCoreClient(
  options: CoreClientOptions & { mode?: ClientMode } = {}
): GroundingClient {
  const { mode = 'concurrent', ...clientOptions } = options;
  return mode === 'serial' ? new SerialCoreClient(clientOptions) : new CoreClient(clientOptions);
}
