import { describe, it, expect } from 'vitest';
import {
  classifyStatus,
  CREATE_OK_STATUSES,
  DELETE_OK_STATUSES,
  isSuccessStatus,
  isTransientStatus,
} from '../../src/client/status.js';

describe('classifyStatus', () => {
  it('groups statuses by class', () => {
    expect(classifyStatus(200)).toBe('success');
    expect(classifyStatus(204)).toBe('success');
    expect(classifyStatus(404)).toBe('client-error');
    expect(classifyStatus(429)).toBe('client-error');
    expect(classifyStatus(503)).toBe('server-error');
    expect(classifyStatus(302)).toBe('other');
  });
});

describe('isTransientStatus', () => {
  it('treats 429 and every 5xx as transient', () => {
    expect(isTransientStatus(429)).toBe(true);
    expect(isTransientStatus(500)).toBe(true);
    expect(isTransientStatus(599)).toBe(true);
  });

  it('treats other statuses as terminal', () => {
    expect(isTransientStatus(200)).toBe(false);
    expect(isTransientStatus(400)).toBe(false);
    expect(isTransientStatus(404)).toBe(false);
    expect(isTransientStatus(600)).toBe(false);
  });
});

describe('status sets', () => {
  it('accepts 200 and 201 for create', () => {
    expect([...CREATE_OK_STATUSES]).toEqual([200, 201]);
  });

  it('accepts 200, 202 and 204 for delete', () => {
    expect([...DELETE_OK_STATUSES]).toEqual([200, 202, 204]);
    expect(isSuccessStatus(202)).toBe(true);
  });
});
