import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  buildErrorPayload,
  reportError,
} from '../server/observability/reportError';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('reportError', () => {
  it('builds a payload without empty optional fields', () => {
    expect(
      buildErrorPayload({
        errorKey: 'STORE_FAILED',
        kind: 'import_record',
        route: 'importMessages',
      }),
    ).toEqual({
      service: 'inbox',
      kind: 'import_record',
      severity: 'error',
      errorKey: 'STORE_FAILED',
      route: 'importMessages',
    });
  });

  it('logs JSON at the requested severity', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    reportError({
      errorKey: 'VALIDATION_FAILED',
      kind: 'import_record',
      route: 'importMessages',
      severity: 'warn',
      message: 'Record 0 is invalid',
      details: { index: 0 },
    });

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toEqual({
      service: 'inbox',
      kind: 'import_record',
      severity: 'warn',
      errorKey: 'VALIDATION_FAILED',
      route: 'importMessages',
      message: 'Record 0 is invalid',
      details: { index: 0 },
    });
  });
});
