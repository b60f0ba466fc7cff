import type { TxSummary } from '../types/index.js';

/**
 * One JSON object, keys sorted, 2-space indent.
 */
export function formatJson(summary: TxSummary): string {
  const keys = Object.keys(summary).sort();
  return JSON.stringify(summary, keys, 2);
}

export function formatText(summary: TxSummary): string {
  return [
    `🌐 Network: ${summary.network} (${summary.chainId})`,
    `🔗 Explorer: ${summary.explorer}`,
    `👤 From: ${summary.fromAddr}`,
    `🎯 To: ${summary.toAddr}`,
    `📦 Status: ${summary.status === 1 ? 'Success' : 'Failed'}`,
    `⛏  Miner: ${summary.miner}`,
    `🔢 Block: ${summary.blockNumber}  ⏱  ${formatUtc(summary.timestamp)} UTC`,
    `🔁 Confirmations: ${summary.confirmations}`,
    `⛽ Gas Used: ${summary.gasUsed}/${summary.gasLimit} (${formatPercent(summary.gasEfficiency)}%)`,
    `⛽ Gas Price: ${summary.gasPriceGwei.toFixed(2)} gwei  BaseFee: ${summary.baseFeeGwei.toFixed(2)} gwei`,
    `💰 Total Fee: ${summary.totalFeeEth.toFixed(6)} ETH`,
  ].join('\n');
}

/**
 * The stored value as-is, with at least one decimal: 100 → `100.0`, 33.33 → `33.33`.
 */
export function formatPercent(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatLatency(latencyMs: number): string {
  return `⚡ RPC latency: ${(latencyMs / 1000).toFixed(3)}s`;
}

/**
 * unix seconds → `YYYY-MM-DD HH:MM:SS`
 */
export function formatUtc(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().slice(0, 19).replace('T', ' ');
}
