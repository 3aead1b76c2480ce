import { describe, it, expect } from '@jest/globals';
import {
  ERROR_CODES,
  GatewayError,
  GatewayErrorKind,
  isGatewayError,
  kindForCode,
  methodNotFound,
  invalidParams,
  internalError,
  rpcError,
  validationError,
  rateLimitError,
  parseError,
} from '../../src/index';

describe('ERROR_CODES', () => {
  it('binds every kind to its JSON-RPC code', () => {
    expect(ERROR_CODES).toEqual({
      ParseError: -32700,
      InvalidRequestError: -32600,
      MethodNotFoundError: -32601,
      InvalidParamsError: -32602,
      InternalError: -32603,
      BitcoinMCPError: -32000,
      BitcoinRPCError: -32001,
      ValidationError: -32002,
      NetworkError: -32003,
      RateLimitError: -32004,
    });
  });

  it('uses a distinct code per kind', () => {
    const codes = Object.values(ERROR_CODES);
    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('GatewayError', () => {
  it('derives code and name from kind', () => {
    const err = new GatewayError('NetworkError', 'mempool.space unreachable');
    expect(err.kind).toBe('NetworkError');
    expect(err.code).toBe(-32003);
    expect(err.name).toBe('NetworkError');
    expect(err.message).toBe('mempool.space unreachable');
  });

  it('is instanceof Error', () => {
    const err = rpcError('boom');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(GatewayError);
    expect(isGatewayError(err)).toBe(true);
    expect(isGatewayError(new Error('plain'))).toBe(false);
  });

  it('keeps the cause off the wire', () => {
    const cause = new Error('socket hang up');
    const err = rpcError('node unreachable', { cause, data: { method: 'getblockcount' } });
    expect(err.cause).toBe(cause);
    expect(err.toJsonRpcError()).toEqual({
      code: -32001,
      message: 'node unreachable',
      data: { method: 'getblockcount' },
    });
  });

  it('omits data from the wire form when absent', () => {
    expect(parseError().toJsonRpcError()).toEqual({ code: -32700, message: 'Parse error' });
    expect('data' in rateLimitError().toJsonRpcError()).toBe(false);
  });

  it('supports exhaustive matching on kind', () => {
    const describeKind = (kind: GatewayErrorKind): string => {
      switch (kind) {
        case 'ParseError':
        case 'InvalidRequestError':
        case 'MethodNotFoundError':
        case 'InvalidParamsError':
          return 'envelope';
        case 'InternalError':
        case 'BitcoinMCPError':
          return 'gateway';
        case 'BitcoinRPCError':
        case 'NetworkError':
        case 'RateLimitError':
          return 'upstream';
        case 'ValidationError':
          return 'caller';
      }
    };
    expect(describeKind(validationError('bad', 'address').kind)).toBe('caller');
    expect(describeKind(methodNotFound('x').kind)).toBe('envelope');
  });
});

describe('factories', () => {
  it('should attach the offending field', () => {
    expect(validationError('Invalid Bitcoin address', 'address').toJsonRpcError()).toEqual({
      code: -32002,
      message: 'Invalid Bitcoin address',
      data: { field: 'address' },
    });
    expect(invalidParams('count must be an integer', 'count').data).toEqual({ field: 'count' });
  });

  it('should name the missing method', () => {
    const err = methodNotFound('no_such_method');
    expect(err.code).toBe(-32601);
    expect(err.message).toBe('Method not found: no_such_method');
  });

  it('should use a fixed message for internal errors', () => {
    const err = internalError(new TypeError('x is undefined'));
    expect(err.message).toBe('Internal error');
    expect(err.toJsonRpcError()).toEqual({ code: -32603, message: 'Internal error' });
  });
});

describe('kindForCode', () => {
  it('resolves known codes', () => {
    expect(kindForCode(-32004)).toBe('RateLimitError');
    expect(kindForCode(-32000)).toBe('BitcoinMCPError');
  });

  it('returns undefined for foreign codes', () => {
    expect(kindForCode(-5)).toBeUndefined();
  });
});
