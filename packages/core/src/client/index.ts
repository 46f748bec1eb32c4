export {
  GroundingClient,
  CoreClient,
  SerialCoreClient,
  createCoreClient,
  type ClientMode,
  type CoreClientOptions,
} from './core-client.js';

export {
  interpretQuery,
  interpretSignal,
  interpretStatus,
  interpretStage,
  groundedOrAbsent,
} from './replies.js';
