/**
 * src/index.ts — public surface of the objects API client and its test harness.
 *
 *   import { createClientFromEnv } from 'objects-api-suite';
 *   const client = createClientFromEnv();
 *   const { status, body } = await client.getById('7');
 */

export { ObjectsClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client/ObjectsClient.js';
export { executeWithRetry, computeDelay, DEFAULT_RETRY_POLICY } from './client/retry.js';
export type { RetryHooks, RetryInfo } from './client/retry.js';
export {
  classifyStatus,
  isSuccessStatus,
  isTransientStatus,
  CREATE_OK_STATUSES,
  DELETE_OK_STATUSES,
} from './client/status.js';
export type { StatusClass } from './client/status.js';
export { decodeJson } from './client/decode.js';
export { readString, readNumber, readInteger, readBoolean } from './client/attributes.js';
export { NetworkError, ConfigError } from './client/types.js';
export type { ApiResult, ObjectsClientOptions, RetryPolicy } from './client/types.js';
export * from './client/schemas/index.js';
export { loadConfig, createClientFromEnv } from './config.js';
export type { ObjectsApiConfig } from './config.js';
export { loadTestData, TestDataNotFoundError, TestDataError, DEFAULT_TEST_DATA_DIR } from './testing/test-data.js';
export {
  makeUnique,
  randomObjectId,
  cleanupObject,
  withCreatedObject,
  ObjectCreationError,
} from './testing/fixture.js';
export type { CleanupErrorHandler } from './testing/fixture.js';
