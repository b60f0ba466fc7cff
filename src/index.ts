/**
 * Transaction Inspector - library entry point
 */

export { inspectTransaction } from './inspect.js';
export { runCli } from './cli/run.js';
export type { CliDeps, OutputStream } from './cli/run.js';
export type { InspectOptions } from './inspect.js';
export {
  createRpcClient,
  connect,
  getChainId,
  getTransaction,
  getTransactionReceipt,
  getBlock,
  getBlockNumber,
} from './tools/rpc.js';
export type { RpcClient, RpcClientOptions, Connection } from './tools/rpc.js';
export { buildSummary, gasEfficiency, confirmations, resolveGasPrice } from './summary/builder.js';
export type { SummaryInput } from './summary/builder.js';
export { formatJson, formatText, formatLatency } from './summary/format.js';
export { NETWORKS, networkName, explorerUrl } from './tools/networks.js';
export { isTxHash } from './tools/validate.js';
export { loadConfig } from './config/index.js';
export * from './errors/index.js';
export type { TxSummary, InspectionResult, Config, RpcTransaction, RpcReceipt, RpcBlock } from './types/index.js';
