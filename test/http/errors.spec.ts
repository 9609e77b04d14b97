import { describe, expect, it } from 'vitest';
import {
  BadRequestException,
  DomainException,
  getStatusCodeFromErrorCode,
  NotFoundException,
} from '../../src/http/errors.js';
import {
  InvalidSortException,
  ParameterBindingException,
  QueryExecutionException,
} from '../../src/query/errors.js';

describe('HTTP Exception Classes', () => {
  describe('BadRequestException', () => {
    it('should create with default message', () => {
      const error = new BadRequestException();
      expect(error.message).toBe('Bad request');
      expect(error.code).toBe('BAD_REQUEST');
      expect(error.name).toBe('BadRequestException');
    });

    it('should keep the cause when given', () => {
      const cause = new Error('engine said no');
      const error = new BadRequestException('Query rejected', { cause });
      expect(error.cause).toBe(cause);
    });

    it('should leave cause unset by default', () => {
      expect('cause' in new BadRequestException('Query rejected')).toBe(false);
    });
  });

  describe('NotFoundException', () => {
    it('should create with default message', () => {
      const error = new NotFoundException();
      expect(error.message).toBe('Not found');
      expect(error.code).toBe('NOT_FOUND');
      expect(error.name).toBe('NotFoundException');
    });
  });

  describe('query exceptions', () => {
    it('should all be bad requests named after their class', () => {
      const errors = [
        new ParameterBindingException('open', 'notabool', 'Expected "true" or "false"'),
        new InvalidSortException('bogusField', 'historic-incident'),
        new QueryExecutionException('historic-incident', new Error('boom')),
      ];

      expect(errors.map((error) => error.name)).toEqual([
        'ParameterBindingException',
        'InvalidSortException',
        'QueryExecutionException',
      ]);
      for (const error of errors) {
        expect(error).toBeInstanceOf(BadRequestException);
        expect(error.code).toBe('BAD_REQUEST');
      }
    });
  });
});

describe('getStatusCodeFromErrorCode', () => {
  it('should map known codes', () => {
    expect(getStatusCodeFromErrorCode('BAD_REQUEST')).toBe(400);
    expect(getStatusCodeFromErrorCode('NOT_FOUND')).toBe(404);
  });

  it('should default unknown codes to 500', () => {
    expect(getStatusCodeFromErrorCode('ENGINE_UNAVAILABLE')).toBe(500);
    expect(new DomainException('down', 'ENGINE_UNAVAILABLE').code).toBe('ENGINE_UNAVAILABLE');
  });
});
