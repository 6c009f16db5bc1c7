/**
 * @fileoverview Tests for the error taxonomy and shaper
 */

import { describe, it, expect } from 'vitest';
import {
  ApplicationError,
  HandlerTimeoutError,
  InternalError,
  InvalidParamsError,
  InvalidRequestError,
  MethodNotFoundError,
  ParseError,
  RpcError,
  classifyError,
  isRpcError,
  shapeError,
} from '../errors.js';

describe('shapeError', () => {
  it('should map each reserved kind to its code', () => {
    expect(shapeError(new ParseError())).toEqual({ code: -32700, message: 'Parse error' });
    expect(shapeError(new InvalidRequestError('method must be a non-empty string'))).toEqual({
      code: -32600,
      message: 'Invalid Request',
      data: 'method must be a non-empty string',
    });
    expect(shapeError(new MethodNotFoundError('eth_bogus'))).toEqual({
      code: -32601,
      message: 'Method not found',
    });
    expect(shapeError(new InvalidParamsError())).toEqual({ code: -32602, message: 'Invalid params' });
    expect(shapeError(new InternalError('state db closed'))).toEqual({
      code: -32603,
      message: 'state db closed',
    });
  });

  it('should pass handler message and data through', () => {
    expect(shapeError(new InvalidParamsError('bad address', { field: 'to' }))).toEqual({
      code: -32602,
      message: 'bad address',
      data: { field: 'to' },
    });
  });

  it('should report timeouts as internal errors', () => {
    const timeout = new HandlerTimeoutError(250);

    expect(timeout).toBeInstanceOf(InternalError);
    expect(timeout.timeoutMs).toBe(250);
    expect(shapeError(timeout)).toEqual({ code: -32603, message: 'Handler timed out' });
  });

  it('should pass application errors through', () => {
    expect(classifyError(new ApplicationError(3, 'execution reverted', '0xdeadbeef'))).toEqual({
      error: { code: 3, message: 'execution reverted', data: '0xdeadbeef' },
      fault: 'reported',
    });
    expect(shapeError(new ApplicationError(-32000, 'insufficient balance'))).toEqual({
      code: -32000,
      message: 'insufficient balance',
    });
  });

  it.each([-32001, -32601, 1.5, Number.NaN])('should downgrade application code %s', (code) => {
    expect(classifyError(new ApplicationError(code, 'nope'))).toEqual({
      error: { code: -32603, message: 'Internal error' },
      fault: 'invalid_code',
    });
  });

  it('should downgrade an application-kind error with no code', () => {
    expect(classifyError(new RpcError('Application', 'no code')).fault).toBe('invalid_code');
  });

  it('should hide unexpected faults behind an opaque message', () => {
    const leaked = new Error('ECONNREFUSED 10.0.0.5:8551 at /srv/node/state.ts:42');

    expect(classifyError(leaked)).toEqual({
      error: { code: -32603, message: 'Internal error' },
      fault: 'unexpected',
    });
    expect(classifyError('thrown string').fault).toBe('unexpected');
    expect(classifyError(undefined).fault).toBe('unexpected');
  });

  it('should drop data that cannot be serialized', () => {
    expect(shapeError(new InvalidParamsError('too big', { value: 10n }))).toEqual({
      code: -32602,
      message: 'too big',
    });
  });
});

describe('error classes', () => {
  it('should keep names and kinds', () => {
    const notFound = new MethodNotFoundError('moj_missing');

    expect(notFound.name).toBe('MethodNotFoundError');
    expect(notFound.kind).toBe('MethodNotFound');
    expect(notFound.method).toBe('moj_missing');
    expect(isRpcError(notFound)).toBe(true);
    expect(isRpcError(new Error('x'))).toBe(false);
  });
});
