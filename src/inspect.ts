import type { Hash } from 'viem';
import { buildSummary } from './summary/builder.js';
import {
  getBlock,
  getBlockNumber,
  getChainId,
  getTransaction,
  getTransactionReceipt,
  type RpcClient,
} from './tools/rpc.js';
import type { InspectionResult } from './types/index.js';

export interface InspectOptions {
  /** Already known from the connectivity probe; fetched when omitted. */
  chainId?: number;
}

/**
 * Fetch transaction → receipt → block + latest block number, then derive the summary.
 * A transaction without a block number is pending and ends the run early.
 */
export async function inspectTransaction(
  client: RpcClient,
  txHash: Hash,
  options: InspectOptions = {}
): Promise<InspectionResult> {
  const transaction = await getTransaction(client, txHash);
  if (transaction.blockNumber === null || transaction.blockNumber === undefined) {
    return { kind: 'pending', txHash };
  }

  const receipt = await getTransactionReceipt(client, txHash);

  // 区块头和最新高度互不依赖，并行获取
  const [block, latestBlock, chainId] = await Promise.all([
    getBlock(client, receipt.blockNumber),
    getBlockNumber(client),
    options.chainId ?? getChainId(client),
  ]);

  const summary = buildSummary({ chainId, txHash, transaction, receipt, block, latestBlock });
  return { kind: 'mined', summary };
}
