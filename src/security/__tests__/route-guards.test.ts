import { describe, it, expect } from 'vitest';
import { tokenMatches } from '../route-guards.js';

describe('tokenMatches', () => {
  it('should accept only the exact configured token', () => {
    expect(tokenMatches('test-token', 'test-token')).toBe(true);
    expect(tokenMatches('test-tokem', 'test-token')).toBe(false);
    expect(tokenMatches('test-token-extra', 'test-token')).toBe(false);
  });

  it('should reject when either side is empty', () => {
    expect(tokenMatches('', 'test-token')).toBe(false);
    expect(tokenMatches('test-token', '')).toBe(false);
    expect(tokenMatches('', '')).toBe(false);
  });
});
