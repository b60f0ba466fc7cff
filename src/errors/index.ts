import type { z } from 'zod';

/**
 * Base class for every failure the inspector reports to the user.
 * The CLI prints `message` for these and a stack trace for anything else.
 */
export class InspectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InspectorError';
  }
}

export class InvalidTxHashError extends InspectorError {
  constructor(public readonly value: string) {
    super('Invalid tx hash.');
    this.name = 'InvalidTxHashError';
  }
}

export class UsageError extends InspectorError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigValidationError extends InspectorError {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Connectivity probe failed: endpoint unreachable, timed out, or not speaking JSON-RPC.
 */
export class RpcConnectionError extends InspectorError {
  constructor(public readonly rpcUrl: string, cause?: unknown) {
    super(`Could not connect to RPC: ${rpcUrl}`, { cause });
    this.name = 'RpcConnectionError';
  }
}

/**
 * Transport or node-side failure of a single JSON-RPC call.
 */
export class RpcRequestError extends InspectorError {
  constructor(public readonly method: string, cause: unknown) {
    super(`RPC request ${method} failed: ${describeCause(cause)}`, { cause });
    this.name = 'RpcRequestError';
  }
}

/**
 * The node answered, but the payload does not have the expected shape.
 */
export class RpcDecodeError extends InspectorError {
  constructor(public readonly method: string, public readonly issues: z.ZodIssue[]) {
    const detail = issues.map(issue => `${formatPath(issue.path)}: ${issue.message}`).join('; ');
    super(`Malformed ${method} response (${detail})`);
    this.name = 'RpcDecodeError';
  }
}

export class MissingFieldError extends InspectorError {
  constructor(public readonly method: string, public readonly field: string) {
    super(`${method} response is missing required field "${field}"`);
    this.name = 'MissingFieldError';
  }
}

export class NotFoundError extends InspectorError {
  constructor(public readonly resource: 'transaction' | 'receipt' | 'block', public readonly id: string) {
    super(`No ${resource} found for ${id}`);
    this.name = 'NotFoundError';
  }
}

export function formatPath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // viem errors carry a multi-line message; the first line is the summary
    return cause.message.split('\n')[0] ?? cause.name;
  }
  return String(cause);
}
