import { describe, it, expect } from 'vitest';
import { isGetParametersResponse } from './parameters.js';

describe('isGetParametersResponse', () => {
  it('should accept a response with parameters and invalid names', () => {
    expect(
      isGetParametersResponse({
        Parameters: [{ Name: '/a', Value: '1', Type: 'String' }],
        InvalidParameters: ['/b'],
      })
    ).toBe(true);
  });

  it('should accept an empty object', () => {
    expect(isGetParametersResponse({})).toBe(true);
  });

  it('should reject non-objects', () => {
    expect(isGetParametersResponse(null)).toBe(false);
    expect(isGetParametersResponse('text')).toBe(false);
    expect(isGetParametersResponse([])).toBe(false);
  });

  it('should reject malformed parameters', () => {
    expect(isGetParametersResponse({ Parameters: {} })).toBe(false);
    expect(isGetParametersResponse({ Parameters: [{ Name: '/a' }] })).toBe(false);
    expect(isGetParametersResponse({ Parameters: [null] })).toBe(false);
  });

  it('should reject malformed invalid-parameter lists', () => {
    expect(isGetParametersResponse({ InvalidParameters: [1] })).toBe(false);
  });
});
