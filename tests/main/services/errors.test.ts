import { describe, it, expect } from 'vitest';
import {
  CacheError,
  ContractError,
  LookupError,
  ResponseFormatError,
  TransportError,
  errorMessage,
  isLookupError,
  wrapError,
} from '../../../src/main/services/errors';

describe('LookupError', () => {
  it('should default step to the category', () => {
    const error = new LookupError('failed', 'CacheError');
    expect(error.name).toBe('CacheError');
    expect(error.step).toBe('CacheError');
    expect(error.item).toBeNull();
    expect(error.cause).toBeNull();
  });

  it('should keep subclass prototypes', () => {
    const error = new TransportError('offline');
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(LookupError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should build a user message with the item', () => {
    expect(new ContractError('Lookup item must belong to a set', { item: 'track.dat' }).toUserMessage()).toBe(
      'ContractError [track.dat]: Lookup item must belong to a set',
    );
    expect(new CacheError('closed').toUserMessage()).toBe('CacheError: closed');
  });

  it('should describe itself for logging', () => {
    const error = new ResponseFormatError('bad body', { item: 'track.dat', cause: new Error('unexpected token') });
    const logObject = error.toLogObject();
    expect(logObject.category).toBe('ResponseFormatError');
    expect(logObject.step).toBe('parsing');
    expect(logObject.item).toBe('track.dat');
    expect(logObject.cause).toBe('unexpected token');
    expect(logObject.timestamp).toBe(error.timestamp.toISOString());
  });
});

describe('TransportError', () => {
  it('should carry status code and endpoint', () => {
    const error = new TransportError('items/lookup rejected the request (404)', {
      statusCode: 404,
      endpoint: 'items/lookup',
    });
    expect(error.step).toBe('request');
    expect(error.toLogObject()).toMatchObject({ statusCode: 404, endpoint: 'items/lookup' });
  });

  it('should default status code and endpoint to null', () => {
    const error = new TransportError('socket hang up');
    expect(error.statusCode).toBeNull();
    expect(error.endpoint).toBeNull();
  });
});

describe('step defaults', () => {
  it('should name the lookup stage for each category', () => {
    expect(new CacheError('x').step).toBe('cache');
    expect(new ContractError('x').step).toBe('precondition');
    expect(new ContractError('x', { step: 'custom' }).step).toBe('custom');
  });
});

describe('isLookupError', () => {
  it('should recognise lookup errors only', () => {
    expect(isLookupError(new CacheError('x'))).toBe(true);
    expect(isLookupError(new Error('x'))).toBe(false);
    expect(isLookupError('x')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('wrapError', () => {
  it('should return lookup errors unchanged', () => {
    const error = new CacheError('x');
    expect(wrapError(error, 'TransportError')).toBe(error);
  });

  it('should wrap plain errors in the requested category', () => {
    const cause = new Error('ECONNRESET');
    const wrapped = wrapError(cause, 'TransportError', { item: 'track.dat' });
    expect(wrapped).toBeInstanceOf(TransportError);
    expect(wrapped.message).toBe('ECONNRESET');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.item).toBe('track.dat');
  });

  it('should wrap non-error values', () => {
    const wrapped = wrapError('disk full', 'CacheError');
    expect(wrapped).toBeInstanceOf(CacheError);
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause?.message).toBe('disk full');
  });

  it('should use a fallback message for empty errors', () => {
    expect(wrapError(new Error(''), 'ResponseFormatError').message).toBe('Unknown error');
  });
});
