/**
 * fixture.ts — helpers for tests that create objects on the remote API.
 *
 * Each test owns its objects: names are made unique per run and every object
 * created through withCreatedObject() is deleted on every exit path.
 */

import { randomUUID } from 'node:crypto';
import type { ObjectsClient } from '../client/ObjectsClient.js';
import type { ApiObject, ObjectCreateRequest } from '../client/schemas/index.js';
import { DELETE_OK_STATUSES } from '../client/status.js';

export function randomObjectId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * makeUnique — copies a template, appending a suffix (random hex by default) to its name.
 * The data map is copied so tests can change it without touching the template.
 */
export function makeUnique(template: ObjectCreateRequest, suffix?: string): ObjectCreateRequest {
  return {
    name: `${template.name} ${suffix ?? randomObjectId()}`,
    data: template.data == null ? null : { ...template.data },
  };
}

export class ObjectCreationError extends Error {
  readonly status: number;
  constructor(status: number) {
    super(`Expected create to return an object with an id, got status ${status}`);
    this.name = 'ObjectCreationError';
    this.status = status;
  }
}

export type CleanupErrorHandler = (error: unknown, id: string) => void;

const warnCleanupError: CleanupErrorHandler = (error, id) =>
  console.warn(`Cleanup of object ${id} failed:`, error);

/**
 * cleanupObject — deletes an object without throwing.
 *
 * A delete that rejects or answers with a status outside DELETE_OK_STATUSES is
 * handed to `onCleanupError` (default: console.warn). Meant for finally blocks,
 * where a throw would replace the error that got the test there.
 */
export async function cleanupObject(
  client: ObjectsClient,
  id: string,
  onCleanupError: CleanupErrorHandler = warnCleanupError,
): Promise<void> {
  try {
    const deleted = await client.delete(id);
    if (!DELETE_OK_STATUSES.has(deleted.status)) {
      onCleanupError(new Error(`Delete answered with status ${deleted.status}`), id);
    }
  } catch (error) {
    onCleanupError(error, id);
  }
}

/**
 * withCreatedObject — creates an object, hands it and the create status to `fn`,
 * then deletes it through cleanupObject() whether `fn` resolves or throws.
 */
export async function withCreatedObject<T>(
  client: ObjectsClient,
  request: ObjectCreateRequest,
  fn: (created: ApiObject, status: number) => Promise<T>,
  onCleanupError: CleanupErrorHandler = warnCleanupError,
): Promise<T> {
  const { status, body } = await client.create(request);
  if (!body || body.id.trim() === '') {
    throw new ObjectCreationError(status);
  }

  try {
    return await fn(body, status);
  } finally {
    await cleanupObject(client, body.id, onCleanupError);
  }
}
