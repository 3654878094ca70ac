import { describe, expect, it } from 'vitest';
import { ConfigError } from '@screenlingo/config';
import { describeError } from './error-handler';
import { FlowError } from './errors';

describe('describeError', () => {
  it('shows description, sanitized detail and suggestion for flow errors', () => {
    const error = new FlowError('translationFailure', 'Invalid configuration: Bearer test-secret rejected');

    expect(describeError(error)).toBe(
      [
        'Could not translate the recognized text.',
        'Invalid configuration: Bearer *** rejected',
        'Check the translation engine configuration and API key, or configure a fallback engine.',
      ].join('\n')
    );
  });

  it('shows only the description when cancelled', () => {
    expect(describeError(new FlowError('cancelled'))).toBe('The translation was cancelled.');
  });

  it('lists configuration issues', () => {
    const error = new ConfigError('Invalid configuration at /tmp/config.json', [
      'overlay.fontSize: Number must be greater than or equal to 8',
    ]);

    expect(describeError(error)).toBe(
      'Invalid configuration at /tmp/config.json\n  - overlay.fontSize: Number must be greater than or equal to 8'
    );
  });

  it('sanitizes other errors', () => {
    expect(describeError(new Error('GET https://api.test?key=test-secret failed'))).toBe(
      'GET https://api.test?key=*** failed'
    );
  });
});
