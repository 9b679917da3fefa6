import { deepRedact, shouldRedact } from './redaction.util';

describe('redaction.util', () => {
  it('should match keys case-insensitively', () => {
    expect(shouldRedact('apiKey')).toBe(true);
    expect(shouldRedact('Authorization')).toBe(true);
    expect(shouldRedact('model')).toBe(false);
  });

  it('should redact nested secrets and keep everything else', () => {
    expect(
      deepRedact({
        model: 'gpt-4o-mini',
        llm: { apiKey: 'test-key', retries: [{ token: 'test-secret' }, 3] },
        note: null,
      }),
    ).toEqual({
      model: 'gpt-4o-mini',
      llm: { apiKey: '[REDACTED]', retries: [{ token: '[REDACTED]' }, 3] },
      note: null,
    });
  });
});
