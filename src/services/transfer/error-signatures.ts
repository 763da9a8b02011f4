import axios from 'axios';
import type { PlatformId } from '../../types/upload.js';
import { TransferError, errorMessage } from '../../utils/errors.js';
import type { TransferErrorCategory } from '../../utils/errors.js';

// Upload caps and rate limits, as reported by YouTube and TikTok.
const QUOTA_SIGNATURES = [
  'uploadLimitExceeded',
  'exceeded the number of videos',
  'quotaExceeded',
  'rateLimitExceeded',
  'spam_risk_too_many_posts',
  'spam_risk_too_many_pending_share',
  'rate_limit_exceeded'
];

const AUTH_SIGNATURES = ['access_token_invalid', 'invalid_grant', 'authError'];

const MAX_DETAIL_LENGTH = 500;

export function classifySignature(status: number | undefined, text: string): TransferErrorCategory {
  if (status === 429 || QUOTA_SIGNATURES.some((signature) => text.includes(signature))) {
    return 'quota';
  }
  if (status === 401 || AUTH_SIGNATURES.some((signature) => text.includes(signature))) {
    return 'auth';
  }
  return 'transport';
}

function stringifyBody(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function numericField(value: unknown, key: 'status' | 'code'): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

/**
 * Turn any failure of a remote call into a categorized TransferError. Quota
 * and auth categories stop the run; transport fails only the current file.
 */
export function classifyHttpFailure(platform: PlatformId, error: unknown, action: string): TransferError {
  if (error instanceof TransferError) return error;

  let status: number | undefined;
  let body = '';
  if (axios.isAxiosError(error)) {
    status = error.response?.status;
    body = stringifyBody(error.response?.data);
  } else {
    // googleapis (gaxios) errors carry the HTTP status as `status` or `code`.
    status = numericField(error, 'status') ?? numericField(error, 'code');
  }

  const message = errorMessage(error);
  const category = classifySignature(status, `${message} ${body}`);
  const detail = (body || message).slice(0, MAX_DETAIL_LENGTH);
  const prefix = status !== undefined ? `${action} failed (HTTP ${status})` : `${action} failed`;

  return new TransferError(platform, category, `${prefix}: ${detail}`, { cause: error, status });
}

/** API responses that report an error inside a 2xx body. */
export function failureFromBody(platform: PlatformId, action: string, code: string, detail: string): TransferError {
  return new TransferError(platform, classifySignature(undefined, code), `${action} failed: ${code}${detail ? ` (${detail})` : ''}`);
}
