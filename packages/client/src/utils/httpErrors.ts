type ErrorLike = {
  status?: number;
  statusCode?: number;
  response?: { status?: number };
  code?: string;
  name?: string;
  message?: string;
};

export function extractHttpStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') return null;
  const err = error as ErrorLike;
  const status =
    (typeof err.status === 'number' ? err.status : undefined) ??
    (typeof err.statusCode === 'number' ? err.statusCode : undefined) ??
    (typeof err.response?.status === 'number' ? err.response.status : undefined);
  if (status === undefined || !Number.isFinite(status)) return null;
  return Math.floor(status);
}

export function isTimeoutError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  const err = error as ErrorLike;
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return true;
  const msg = String(err.message || '').toLowerCase();
  if (msg.includes('timeout')) return true;
  if (msg.includes('timed out')) return true;
  const code = String(err.code || '').toUpperCase();
  return code === 'ETIMEDOUT';
}

export function describeError(error: unknown): { name?: string; message: string } {
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { message: String(error) };
}
