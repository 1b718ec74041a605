/**
 * Shared test helpers — mock factories for notifier tests.
 */

import { vi } from 'vitest';
import type { Logger } from '../src/core/logger.js';
import type { HttpResult } from '../src/core/http.js';

export const SENDKEY = 'SCTtestkey123';
export const ENDPOINT = 'https://sctapi.ftqq.com/SCTtestkey123.send';

// ── Mock Logger ─────────────────────────────────────────────────────

export const createMockLogger = () =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }) satisfies Logger;

// ── Service responses ───────────────────────────────────────────────

export function okResponse(pushid: string | number = '12345'): HttpResult<unknown> {
  return {
    status: 200,
    data: { code: 0, message: '', data: { pushid, readkey: 'rk-1', error: 'SUCCESS', errno: 0 } },
  };
}

export function serviceError(code: number, message: string): HttpResult<unknown> {
  return { status: 200, data: { code, message, data: null } };
}
