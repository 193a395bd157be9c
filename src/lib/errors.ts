// Errors are reported as data; these helpers render whatever was thrown.

export function errorName(e: unknown): string {
  if (e instanceof Error) return e.name || 'Error';
  return typeof e;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || String(e);
  return String(e);
}

export function describeError(e: unknown): string {
  return `${errorName(e)}: ${errorMessage(e)}`;
}
