import { loadConfig } from '../config/index.js';
import { InspectorError, InvalidTxHashError, UsageError } from '../errors/index.js';
import { inspectTransaction } from '../inspect.js';
import { formatJson, formatLatency, formatText } from '../summary/format.js';
import { connect, type RpcClient, type RpcClientOptions } from '../tools/rpc.js';
import { isTxHash } from '../tools/validate.js';
import { USAGE, parseArgs } from './args.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliDeps {
  env: Record<string, string | undefined>;
  createClient: (rpcUrl: string, options: RpcClientOptions) => RpcClient;
  stdout: OutputStream;
  stderr: OutputStream;
}

/**
 * Runs one inspection and returns the exit code. Never rejects:
 * typed failures print `❌ message`, anything else a stack trace.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const out = (line: string) => deps.stdout.write(`${line}\n`);
  const err = (line: string) => deps.stderr.write(`${line}\n`);

  try {
    const options = parseArgs(argv);

    if (options.help || argv.length === 0) {
      out(USAGE);
      return 0;
    }
    if (options.txHash === undefined) {
      throw new UsageError('Missing required argument: tx_hash');
    }

    const txHash = options.txHash;
    if (!isTxHash(txHash)) {
      throw new InvalidTxHashError(txHash);
    }

    // RPC_URL 只在未传 --rpc 时读取
    const config = loadConfig(deps.env, { rpcUrl: options.rpcUrl });
    const client = deps.createClient(config.rpcUrl, { timeoutMs: config.rpcTimeoutMs });
    const { chainId, latencyMs } = await connect(client, config.rpcUrl);
    // stdout 在 --json 模式下只输出 JSON
    (options.json ? err : out)(formatLatency(latencyMs));

    const result = await inspectTransaction(client, txHash, { chainId });
    if (result.kind === 'pending') {
      out('⏳ Pending transaction.');
      return 0;
    }

    out(options.json ? formatJson(result.summary) : formatText(result.summary));
    return 0;
  } catch (error) {
    if (error instanceof InspectorError) {
      err(`❌ ${error.message}`);
    } else {
      err(`\nFailed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    return 1;
  }
}
