import { getErrorInfo } from './error-assertions';

describe('error-assertions', () => {
  describe('getErrorInfo', () => {
    it('returns message and stack for Error instances', () => {
      const error = new Error('boom');
      const info = getErrorInfo(error);
      expect(info.message).toBe('boom');
      expect(info.stack).toBe(error.stack);
    });

    it('passes strings through unchanged', () => {
      expect(getErrorInfo('plain failure')).toEqual({ message: 'plain failure' });
    });

    it('serializes plain objects', () => {
      expect(getErrorInfo({ code: 42 })).toEqual({ message: '{"code":42}' });
    });

    it('falls back to String() when serialization yields nothing', () => {
      expect(getErrorInfo(undefined)).toEqual({ message: 'undefined' });
    });

    it('falls back to String() for circular values', () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;
      expect(getErrorInfo(circular)).toEqual({ message: '[object Object]' });
    });
  });
});
