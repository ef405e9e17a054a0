import { SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'timeout';

/**
 * Per-handler (or per-controller) limit enforced by TimeoutInterceptor
 */
export const Timeout = (timeoutMs: number) =>
  SetMetadata(TIMEOUT_KEY, timeoutMs);
