import { SendResult } from './types';

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET'
]);

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function classifyNetworkError(error: unknown): SendResult {
  if (isAbortError(error)) {
    return { status: 'rejected_transient', reason: 'send_timeout' };
  }

  const code = readCode(error) ?? readCode(error instanceof Error ? error.cause : undefined);
  if (code && TRANSIENT_CODES.has(code)) {
    return { status: 'rejected_transient', reason: `network_error:${code}` };
  }

  const message = error instanceof Error ? error.message : 'unknown';
  return { status: 'rejected_transient', reason: `network_error:${message}` };
}
