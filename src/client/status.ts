export type StatusClass = 'success' | 'client-error' | 'server-error' | 'other';

export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status <= 299) return 'success';
  if (status >= 400 && status <= 499) return 'client-error';
  if (status >= 500 && status <= 599) return 'server-error';
  return 'other';
}

export function isSuccessStatus(status: number): boolean {
  return classifyStatus(status) === 'success';
}

/**
 * isTransientStatus — statuses worth retrying: 429 Too Many Requests and any 5xx.
 */
export function isTransientStatus(status: number): boolean {
  return status === 429 || classifyStatus(status) === 'server-error';
}

// The remote API does not pin an exact code for these, so any of them counts
export const CREATE_OK_STATUSES: ReadonlySet<number> = new Set([200, 201]);
export const DELETE_OK_STATUSES: ReadonlySet<number> = new Set([200, 202, 204]);
