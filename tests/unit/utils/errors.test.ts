/**
 * Tests for the error hierarchy.
 */
import { describe, it, expect } from 'vitest';
import {
  QaStoreError,
  NotFoundError,
  TreeReferenceError,
  ExternalServiceError,
  ValidationError,
  ConfigError,
  ErrorCodes,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('QaStoreError', () => {
  it('should carry code, message and details', () => {
    const error = new QaStoreError('SOME_CODE', 'Something broke', { id: 3 });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('SOME_CODE');
    expect(error.message).toBe('Something broke');
    expect(error.details).toEqual({ id: 3 });
    expect(error.name).toBe('QaStoreError');
  });

  it('should serialize to JSON', () => {
    const error = new QaStoreError('SOME_CODE', 'Something broke', { id: 3 });

    expect(error.toJSON()).toEqual({
      name: 'QaStoreError',
      code: 'SOME_CODE',
      message: 'Something broke',
      details: { id: 3 },
    });
  });
});

describe('error subclasses', () => {
  it.each([
    [NotFoundError, 'NotFoundError', ErrorCodes.QUESTION_NOT_FOUND],
    [TreeReferenceError, 'TreeReferenceError', ErrorCodes.PARENT_NOT_FOUND],
    [ExternalServiceError, 'ExternalServiceError', ErrorCodes.EXTERNAL_TIMEOUT],
    [ValidationError, 'ValidationError', ErrorCodes.INVALID_QA_PAIRS],
    [ConfigError, 'ConfigError', ErrorCodes.CONFIG_LOAD_ERROR],
  ])('%o should extend QaStoreError with name %s', (ErrorClass, name, code) => {
    const error = new ErrorClass(code, 'message');

    expect(error).toBeInstanceOf(QaStoreError);
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it('should not shadow the global ReferenceError', () => {
    const error = new TreeReferenceError(ErrorCodes.CYCLE_DETECTED, 'cycle');
    expect(error).not.toBeInstanceOf(ReferenceError);
  });
});

describe('errorMessage', () => {
  it('should return the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify other values', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
