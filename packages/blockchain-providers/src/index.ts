export type { RpcTransport, TransportFactory } from './core/rpc/transport.js';
export { WsTransport } from './core/rpc/ws-transport.js';
export {
  RpcClient,
  type ResponseSchema,
  type RpcClientOptions,
  type Subscription,
  type SubscriptionMethods,
} from './core/rpc/rpc-client.js';

export * from './blockchains/asset-hub/asset-hub.schemas.js';
export {
  AssetHubBlockSource,
  type AssetHubBlockSourceOptions,
  type NodeConnector,
} from './blockchains/asset-hub/asset-hub.block-source.js';
export {
  FinalizedBlockStream,
  type FinalizedBlockHandler,
  type FinalizedBlockRef,
  type FinalizedBlockStreamOptions,
  type FinalizedHeadSource,
  type StopSubscription,
} from './blockchains/asset-hub/finalized-block-stream.js';
export {
  ASSET_HUB_SCHEMA_ITEMS,
  buildSchemaArtifact,
  diffSchema,
  readSchemaArtifact,
  verifySchema,
  writeSchemaArtifact,
  type SchemaArtifact,
} from './blockchains/asset-hub/schema-artifact.js';
export { connectAssetHub, type AssetHubConnectionOptions } from './blockchains/asset-hub/connect.js';
