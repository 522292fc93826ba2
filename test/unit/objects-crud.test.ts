import { ObjectsClient } from '../../src/client/ObjectsClient.js';
import { DEFAULT_RETRY_POLICY } from '../../src/client/retry.js';
import { FAKE_BASE_URL, setupFakeObjectsApi } from '../support/fake-objects-api.js';
import { defineObjectsCrudSuite } from '../support/objects-suite.js';

setupFakeObjectsApi();
const client = new ObjectsClient({
  baseUrl: FAKE_BASE_URL,
  retry: { ...DEFAULT_RETRY_POLICY, initialDelayMs: 1 },
});

defineObjectsCrudSuite(() => client);
