export type HttpError = Error & { status: number; code: string };

export function httpError(status: number, code: string, message: string): HttpError {
  return Object.assign(new Error(message), { status, code });
}

export function isHttpError(err: unknown): err is HttpError {
  return (
    err instanceof Error &&
    'status' in err && typeof err.status === 'number' &&
    'code' in err && typeof err.code === 'string'
  );
}
