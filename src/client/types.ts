// Options accepted by ObjectsClient — usually built by createClientFromEnv()
export interface ObjectsClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  // Diagnostic sink; write-only, never read back
  log?: (line: string) => void;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly isTransient: (status: number) => boolean;
}

// Every client operation resolves to the final status plus a best-effort body
export interface ApiResult<T> {
  status: number;
  body: T | null;
}

// Thrown when the request never produced an HTTP response (connection failure, timeout)
export class NetworkError extends Error {
  readonly code?: string;
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = 'NetworkError';
    this.code = options?.code;
  }
}

// Thrown by loadConfig() when environment variables fail validation
export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid objects API configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
