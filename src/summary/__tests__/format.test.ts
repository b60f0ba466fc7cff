import { describe, expect, it } from 'vitest';

import type { TxSummary } from '../../types/index.js';
import { formatJson, formatLatency, formatPercent, formatText, formatUtc } from '../format.js';

const HASH = `0x${'ab'.repeat(32)}`;
const FROM = `0x${'11'.repeat(20)}`;
const MINER = `0x${'33'.repeat(20)}`;

const summary: TxSummary = {
  chainId: 137,
  network: 'Polygon',
  txHash: HASH,
  fromAddr: FROM,
  toAddr: '(contract creation)',
  blockNumber: 256,
  timestamp: 1_700_000_000,
  confirmations: 3,
  status: 1,
  gasUsed: 21_000,
  gasLimit: 21_000,
  gasEfficiency: 100,
  gasPriceGwei: 30,
  totalFeeEth: 0.00063,
  baseFeeGwei: 20,
  miner: MINER,
  explorer: `https://polygonscan.com/tx/${HASH}`,
};

describe('formatText', () => {
  it('renders the fixed line layout', () => {
    expect(formatText(summary).split('\n')).toEqual([
      '🌐 Network: Polygon (137)',
      `🔗 Explorer: https://polygonscan.com/tx/${HASH}`,
      `👤 From: ${FROM}`,
      '🎯 To: (contract creation)',
      '📦 Status: Success',
      `⛏  Miner: ${MINER}`,
      '🔢 Block: 256  ⏱  2023-11-14 22:13:20 UTC',
      '🔁 Confirmations: 3',
      '⛽ Gas Used: 21000/21000 (100.0%)',
      '⛽ Gas Price: 30.00 gwei  BaseFee: 20.00 gwei',
      '💰 Total Fee: 0.000630 ETH',
    ]);
  });

  it('shows Failed for a reverted transaction', () => {
    expect(formatText({ ...summary, status: 0 })).toContain('📦 Status: Failed\n');
  });
});

describe('formatJson', () => {
  it('sorts keys and indents by two spaces', () => {
    const lines = formatJson(summary).split('\n');
    expect(lines[0]).toBe('{');
    expect(lines[1]).toBe('  "baseFeeGwei": 20,');
    expect(lines[lines.length - 1]).toBe('}');
  });

  it('round-trips to exactly the summary fields', () => {
    const parsed: unknown = JSON.parse(formatJson(summary));
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('expected a JSON object');
    }

    expect(Object.keys(parsed)).toEqual([
      'baseFeeGwei',
      'blockNumber',
      'chainId',
      'confirmations',
      'explorer',
      'fromAddr',
      'gasEfficiency',
      'gasLimit',
      'gasPriceGwei',
      'gasUsed',
      'miner',
      'network',
      'status',
      'timestamp',
      'toAddr',
      'totalFeeEth',
      'txHash',
    ]);
    expect(parsed).toEqual(summary);
  });
});

describe('formatPercent', () => {
  it('keeps one decimal for whole percentages and the stored digits otherwise', () => {
    expect(formatPercent(100)).toBe('100.0');
    expect(formatPercent(0)).toBe('0.0');
    expect(formatPercent(33.33)).toBe('33.33');
    expect(formatPercent(50.5)).toBe('50.5');
  });

  it('is what the gas line shows', () => {
    expect(formatText({ ...summary, gasUsed: 7_000, gasEfficiency: 33.33 })).toContain(
      '⛽ Gas Used: 7000/21000 (33.33%)\n'
    );
  });
});

describe('formatUtc', () => {
  it('formats unix seconds as UTC', () => {
    expect(formatUtc(0)).toBe('1970-01-01 00:00:00');
    expect(formatUtc(1_700_000_000)).toBe('2023-11-14 22:13:20');
  });
});

describe('formatLatency', () => {
  it('prints seconds with millisecond precision', () => {
    expect(formatLatency(123.4)).toBe('⚡ RPC latency: 0.123s');
    expect(formatLatency(2000)).toBe('⚡ RPC latency: 2.000s');
  });
});
