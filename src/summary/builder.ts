import { formatEther, formatGwei } from 'viem';
import { explorerUrl, networkName } from '../tools/networks.js';
import type { RpcBlock, RpcReceipt, RpcTransaction, TxSummary } from '../types/index.js';

export const CONTRACT_CREATION = '(contract creation)';
export const NOT_AVAILABLE = 'N/A';

// 按顺序尝试：EIP-1559 之后的实际成交价，其次是旧式 gasPrice
const RECEIPT_GAS_PRICE_FIELDS = ['effectiveGasPrice', 'gasPrice'] as const;

export interface SummaryInput {
  chainId: number;
  txHash: string;
  transaction: RpcTransaction;
  receipt: RpcReceipt;
  block: RpcBlock;
  latestBlock: bigint;
}

/**
 * Pure: same inputs, same summary. Wei amounts stay bigint until the final
 * decimal formatting, so fee totals carry no floating-point drift.
 */
export function buildSummary(input: SummaryInput): TxSummary {
  const { chainId, txHash, transaction, receipt, block, latestBlock } = input;

  const gasLimit = transaction.gas ?? 0n;
  const gasPrice = resolveGasPrice(receipt, transaction) ?? 0n;
  const totalFee = receipt.gasUsed * gasPrice;

  return Object.freeze({
    chainId,
    network: networkName(chainId),
    txHash,
    fromAddr: transaction.from,
    toAddr: transaction.to ?? CONTRACT_CREATION,
    blockNumber: Number(receipt.blockNumber),
    timestamp: Number(block.timestamp),
    confirmations: confirmations(latestBlock, receipt.blockNumber),
    status: receipt.status,
    gasUsed: Number(receipt.gasUsed),
    gasLimit: Number(gasLimit),
    gasEfficiency: gasEfficiency(receipt.gasUsed, gasLimit),
    gasPriceGwei: Number(formatGwei(gasPrice)),
    totalFeeEth: Number(formatEther(totalFee)),
    baseFeeGwei: Number(formatGwei(block.baseFeePerGas ?? 0n)),
    miner: block.miner ?? NOT_AVAILABLE,
    explorer: explorerUrl(chainId, txHash),
  });
}

/**
 * Percentage of the gas limit actually consumed, rounded half-to-even to 2 decimals.
 * A zero limit yields 0 instead of dividing by zero.
 */
export function gasEfficiency(gasUsed: bigint, gasLimit: bigint): number {
  if (gasLimit === 0n) return 0;

  // 以 0.01% 为单位做整数除法，余数决定进位
  const scaled = gasUsed * 10_000n;
  let hundredths = scaled / gasLimit;
  const twiceRemainder = (scaled % gasLimit) * 2n;
  if (twiceRemainder > gasLimit || (twiceRemainder === gasLimit && hundredths % 2n === 1n)) {
    hundredths += 1n;
  }
  return Number(hundredths) / 100;
}

export function confirmations(latestBlock: bigint, txBlock: bigint): number {
  return latestBlock > txBlock ? Number(latestBlock - txBlock) : 0;
}

export function resolveGasPrice(receipt: RpcReceipt, transaction: RpcTransaction): bigint | undefined {
  return firstPresent(receipt, RECEIPT_GAS_PRICE_FIELDS) ?? transaction.gasPrice ?? undefined;
}

function firstPresent<T, K extends keyof T>(record: T, keys: readonly K[]): NonNullable<T[K]> | undefined {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}
