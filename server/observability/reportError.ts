export type ReportErrorInput = {
  errorKey: string;
  kind: string;
  route: string;
  severity?: 'error' | 'warn' | 'info';
  message?: string;
  details?: Record<string, unknown>;
};

export type ErrorPayload = {
  service: 'inbox';
  kind: string;
  severity: string;
  errorKey: string;
  route: string;
  message?: string;
  details?: Record<string, unknown>;
};

export function buildErrorPayload(input: ReportErrorInput): ErrorPayload {
  return {
    service: 'inbox',
    kind: input.kind,
    severity: input.severity ?? 'error',
    errorKey: input.errorKey,
    route: input.route,
    ...(input.message ? { message: input.message } : {}),
    ...(input.details ? { details: input.details } : {}),
  };
}

export function reportError(input: ReportErrorInput): ErrorPayload {
  const payload = buildErrorPayload(input);
  const line = JSON.stringify(payload);
  if (payload.severity === 'error') {
    console.error(line);
  } else if (payload.severity === 'warn') {
    console.warn(line);
  } else {
    console.info(line);
  }
  return payload;
}
