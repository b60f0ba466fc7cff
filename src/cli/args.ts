import { UsageError } from '../errors/index.js';
import type { CliOptions } from '../types/index.js';

export const USAGE = `
Transaction Inspector - gas efficiency, fees and confirmations for one transaction

Usage:
  txlens <tx_hash> [--rpc <url>] [--json]

Options:
  --rpc <url>   JSON-RPC endpoint (default: $RPC_URL)
  --json        Print the summary as JSON
  -h, --help    Show this help

Example:
  npm run inspect -- 0x1234567890abcdef... --rpc https://polygon-rpc.com
`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--rpc') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError('--rpc requires a URL');
      }
      options.rpcUrl = value;
      i++;
    } else if (arg.startsWith('--rpc=')) {
      const value = arg.slice('--rpc='.length);
      if (!value) throw new UsageError('--rpc requires a URL');
      options.rpcUrl = value;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (options.txHash === undefined) {
      options.txHash = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}
