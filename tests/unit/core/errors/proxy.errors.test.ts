import { describe, expect, test } from '@jest/globals';
import {
  ClientInputError,
  InvalidRequestBodyError,
  MethodNotAllowedError,
  UnsupportedInputTypeError,
  UpstreamError
} from '../../../../app/core/errors';

describe('proxy errors', () => {
  test('client input errors default to 400', () => {
    const error = new InvalidRequestBodyError('failed to read request body');

    expect(error).toBeInstanceOf(ClientInputError);
    expect(error.statusCode).toBe(400);
    expect(error.name).toBe('InvalidRequestBodyError');
  });

  test('method errors carry 405 and both methods', () => {
    const error = new MethodNotAllowedError('GET', 'POST');

    expect(error.statusCode).toBe(405);
    expect(error.message).toBe('method GET not allowed, expected POST');
  });

  test('input type errors name the type without a position for scalars', () => {
    expect(new UnsupportedInputTypeError('number').message).toBe('unsupported input type: number');
  });

  test('upstream errors keep the cause and its message', () => {
    const cause = new Error('quota exceeded');
    const error = new UpstreamError('batch embed contents', cause);

    expect(error.message).toBe('failed to batch embed contents: quota exceeded');
    expect(error.cause).toBe(cause);
    expect(error.operation).toBe('batch embed contents');
  });

  test('upstream errors without an Error cause use the operation alone', () => {
    expect(new UpstreamError('list models', 'timeout').message).toBe('failed to list models');
  });
});
