/**
 * @fileoverview Tests for request decoding and response construction
 */

import { describe, it, expect } from 'vitest';
import {
  NOT_AN_OBJECT_REASON,
  decodeRequest,
  errorResponse,
  isNotification,
  parseBody,
  serialize,
  successResponse,
  toJsonValue,
  usableId,
} from '../envelope.js';

describe('decodeRequest', () => {
  it('should accept a full request', () => {
    const result = decodeRequest({ jsonrpc: '2.0', method: 'moj_echo', params: ['hi'], id: 1 });

    expect(result).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', method: 'moj_echo', params: ['hi'], id: 1 },
    });
  });

  it('should accept object params and string ids', () => {
    const result = decodeRequest({ jsonrpc: '2.0', method: 'moj_getProof', params: { jobId: 'j1' }, id: 'abc' });

    expect(result).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', method: 'moj_getProof', params: { jobId: 'j1' }, id: 'abc' },
    });
  });

  it('should treat null params as absent', () => {
    const result = decodeRequest({ jsonrpc: '2.0', method: 'eth_chainId', params: null, id: 1 });

    expect(result).toEqual({ ok: true, request: { jsonrpc: '2.0', method: 'eth_chainId', id: 1 } });
  });

  it('should keep an explicit null id', () => {
    const result = decodeRequest({ jsonrpc: '2.0', method: 'eth_chainId', id: null });

    expect(result).toEqual({ ok: true, request: { jsonrpc: '2.0', method: 'eth_chainId', id: null } });
  });

  it('should drop unknown members', () => {
    const result = decodeRequest({ jsonrpc: '2.0', method: 'eth_chainId', id: 1, extra: true });

    expect(result).toEqual({ ok: true, request: { jsonrpc: '2.0', method: 'eth_chainId', id: 1 } });
  });

  it.each([
    [{ method: 'eth_chainId', id: 1 }, 1, 'jsonrpc must be "2.0"'],
    [{ jsonrpc: '1.0', method: 'eth_chainId', id: 'x' }, 'x', 'jsonrpc must be "2.0"'],
    [{ jsonrpc: '2.0', id: 4 }, 4, 'method must be a non-empty string'],
    [{ jsonrpc: '2.0', method: '', id: 4 }, 4, 'method must be a non-empty string'],
    [{ jsonrpc: '2.0', method: 7 }, null, 'method must be a non-empty string'],
    [{ jsonrpc: '2.0', method: 'eth_call', params: 5, id: 9 }, 9, 'params must be an array or an object'],
    [{ jsonrpc: '2.0', method: 'eth_call', id: {} }, null, 'id must be a string, a number or null'],
    [{ jsonrpc: '2.0', method: 'eth_call', id: true }, null, 'id must be a string, a number or null'],
  ])('should reject %j', (candidate, id, reason) => {
    expect(decodeRequest(candidate)).toEqual({ ok: false, id, reason });
  });

  it.each([42, 'eth_chainId', null, [1], true])('should reject non-object %j with a null id', (candidate) => {
    expect(decodeRequest(candidate)).toEqual({ ok: false, id: null, reason: NOT_AN_OBJECT_REASON });
  });
});

describe('usableId', () => {
  it('should only echo string and number ids', () => {
    expect(usableId({ id: 3 })).toBe(3);
    expect(usableId({ id: 'a' })).toBe('a');
    expect(usableId({ id: null })).toBeNull();
    expect(usableId({ id: [1] })).toBeNull();
    expect(usableId({})).toBeNull();
    expect(usableId('id')).toBeNull();
  });
});

describe('isNotification', () => {
  it('should be true for absent and null ids only', () => {
    expect(isNotification({ jsonrpc: '2.0', method: 'm' })).toBe(true);
    expect(isNotification({ jsonrpc: '2.0', method: 'm', id: null })).toBe(true);
    expect(isNotification({ jsonrpc: '2.0', method: 'm', id: 0 })).toBe(false);
    expect(isNotification({ jsonrpc: '2.0', method: 'm', id: '' })).toBe(false);
  });
});

describe('toJsonValue', () => {
  it('should turn undefined into null', () => {
    expect(toJsonValue(undefined)).toBeNull();
  });

  it('should normalize values the way the wire sees them', () => {
    expect(toJsonValue({ a: undefined, b: 1, at: new Date('2024-01-02T03:04:05.000Z') })).toEqual({
      b: 1,
      at: '2024-01-02T03:04:05.000Z',
    });
  });

  it('should refuse values JSON cannot carry', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(toJsonValue(10n)).toBeUndefined();
    expect(toJsonValue(cyclic)).toBeUndefined();
    expect(toJsonValue(() => 1)).toBeUndefined();
  });
});

describe('responses', () => {
  it('should build success and error envelopes', () => {
    expect(successResponse(1, '0x1')).toEqual({ jsonrpc: '2.0', id: 1, result: '0x1' });
    expect(errorResponse(null, { code: -32700, message: 'Parse error' })).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error' },
    });
  });

  it('should serialize in envelope key order', () => {
    expect(serialize([successResponse('a', null)])).toBe('[{"jsonrpc":"2.0","id":"a","result":null}]');
  });
});

describe('parseBody', () => {
  it('should parse strings and UTF-8 bytes', () => {
    expect(parseBody('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
    expect(parseBody(new TextEncoder().encode('["é"]'))).toEqual({ ok: true, value: ['é'] });
  });

  it('should fail on invalid JSON and invalid UTF-8', () => {
    expect(parseBody('not-json')).toEqual({ ok: false });
    expect(parseBody('')).toEqual({ ok: false });
    expect(parseBody(new Uint8Array([0x7b, 0xff, 0x7d]))).toEqual({ ok: false });
  });
});
