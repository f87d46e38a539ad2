/** Standard JSON envelope for every HTTP response */
export interface ApiResponse<T = unknown> {
  data: T | null;
  error: {
    code: string;
    message: string;
    details?: unknown;
  } | null;
  meta?: Record<string, unknown>;
}

export function ok<T>(data: T, meta?: Record<string, unknown>): ApiResponse<T> {
  return { data, error: null, ...(meta ? { meta } : {}) };
}

export function fail(code: string, message: string, details?: unknown): ApiResponse<null> {
  return { data: null, error: { code, message, ...(details !== undefined ? { details } : {}) } };
}
