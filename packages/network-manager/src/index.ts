export { NetworkManager, dataNodeId, operationNodeId } from './manager.js';
export type { RegisterOperationParams } from './manager.js';
export { toDot } from './dot.js';
export type { DotOptions } from './dot.js';
export { describeOperationInputs } from './inputSchema.js';
export { loadManagerConfig } from './config.js';
export type { ManagerServerConfig } from './config.js';
export { createNetworkManagerRouter } from './router.js';
export { createNetworkManagerApp, startNetworkManagerServer } from './server.js';
export type { ServerOptions } from './server.js';
export type {
  ComputeResponse,
  ManagedOperationMeta,
  NetworkGraph,
  NetworkGraphEdge,
  NetworkGraphNode,
  NetworkManagerOptions,
  OperationInputFieldSchema,
  OperationInputFieldType,
  OperationInputSchema,
} from './types.js';
