import got, { RequestError, type Got, type Method, type Response } from 'got';
import {
  NetworkError,
  type ApiResult,
  type ObjectsClientOptions,
  type RetryPolicy,
} from './types.js';
import { DEFAULT_RETRY_POLICY, executeWithRetry } from './retry.js';
import { decodeJson } from './decode.js';
import {
  ApiObjectListSchema,
  ApiObjectSchema,
  DeleteResultSchema,
  type ApiObject,
  type DeleteResult,
  type ObjectCreateRequest,
} from './schemas/index.js';

export const DEFAULT_BASE_URL = 'https://api.restful-api.dev/';
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * ObjectsClient — typed HTTP client for the /objects collection.
 *
 * Design constraints:
 *   - Every call goes through executeWithRetry (429/5xx and network failures retried)
 *   - got's own retry is disabled and HTTP errors are not thrown, so the executor
 *     and the caller see every status code
 *   - Bodies are decoded best-effort: a body that fails to decode comes back as null
 *   - Ids are escaped before they are put into a path; '', '.' and '..' are
 *     rejected with RangeError before any request is sent
 *   - No client-side validation of names or attributes; the remote API decides
 */
export class ObjectsClient {
  private readonly collection = 'objects';
  private readonly retry: RetryPolicy;
  private readonly log?: (line: string) => void;

  // got instance with prefixed URL, JSON headers and the per-request timeout
  private readonly instance: Got;

  constructor(options: ObjectsClientOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.log = options.log;

    this.instance = got.extend({
      prefixUrl: options.baseUrl,
      headers: {
        'Accept': 'application/json',
      },
      timeout: { request: options.timeoutMs ?? DEFAULT_TIMEOUT_MS },
      // Disable got's built-in retry — executeWithRetry owns the retry loop
      retry: { limit: 0 },
      throwHttpErrors: false,
    });
  }

  // ---------------------------------------------------------------------------
  // Resource operations
  // ---------------------------------------------------------------------------

  async list(): Promise<ApiResult<ApiObject[]>> {
    const response = await this.listRaw();
    return { status: response.statusCode, body: decodeJson(response.body, ApiObjectListSchema) };
  }

  /**
   * listRaw — the undecoded list response, headers included.
   */
  listRaw(): Promise<Response<string>> {
    return this.send('GET', this.collection);
  }

  /**
   * create — POST a new object. The server assigns id and createdAt; check both,
   * since a 2xx with a degenerate body decodes to null.
   */
  async create(request: ObjectCreateRequest): Promise<ApiResult<ApiObject>> {
    const response = await this.send('POST', this.collection, request);
    return { status: response.statusCode, body: decodeJson(response.body, ApiObjectSchema) };
  }

  async getById(id: string): Promise<ApiResult<ApiObject>> {
    const response = await this.send('GET', this.itemPath(id));
    return { status: response.statusCode, body: decodeJson(response.body, ApiObjectSchema) };
  }

  /**
   * update — PUT with full replace semantics: attribute keys missing from
   * `request.data` are gone afterwards.
   */
  async update(id: string, request: ObjectCreateRequest): Promise<ApiResult<ApiObject>> {
    const response = await this.send('PUT', this.itemPath(id), request);
    return { status: response.statusCode, body: decodeJson(response.body, ApiObjectSchema) };
  }

  /**
   * delete — the message in the body is informational only.
   */
  async delete(id: string): Promise<ApiResult<DeleteResult>> {
    const response = await this.send('DELETE', this.itemPath(id));
    return { status: response.statusCode, body: decodeJson(response.body, DeleteResultSchema) };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * itemPath — `objects/{id}` with the id escaped as one path segment.
   *
   * Throws RangeError for '', '.' and '..': URL parsing resolves those as dot
   * segments (or an empty segment) whatever their encoding, so the request would
   * reach the collection or the origin root instead of an item.
   */
  private itemPath(id: string): string {
    if (id === '' || id === '.' || id === '..') {
      throw new RangeError(`Invalid object id: ${JSON.stringify(id)}`);
    }
    return `${this.collection}/${encodeURIComponent(id)}`;
  }

  private async send(method: Method, path: string, request?: ObjectCreateRequest): Promise<Response<string>> {
    const json = request === undefined ? undefined : { name: request.name, data: request.data ?? null };

    const response = await executeWithRetry(
      () => this.exchange(method, path, json),
      this.retry,
      {
        onRetry: ({ attempt, delayMs, reason }) =>
          this.log?.(`retry #${attempt} of ${method} ${path} in ${delayMs}ms (${reason})`),
      },
    );
    this.log?.(`${method} ${path} -> ${response.statusCode}`);
    return response;
  }

  // One network exchange. Transport failures surface as NetworkError so the executor can retry them.
  private async exchange(method: Method, path: string, json?: Record<string, unknown>): Promise<Response<string>> {
    try {
      return await this.instance(path, json === undefined ? { method } : { method, json });
    } catch (error) {
      if (error instanceof RequestError) {
        throw new NetworkError(`${method} ${path} failed: ${error.message}`, { cause: error, code: error.code });
      }
      throw error;
    }
  }
}
