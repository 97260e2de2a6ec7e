import { describe, it, expect } from 'vitest';
import { config } from '../config/index.js';

describe('config', () => {
  it('keeps auth on when NODE_ENV is not development', () => {
    expect(process.env.NODE_ENV).not.toBe('development');
    expect(config.authDisabled).toBe(false);
  });

  it('bounds store calls with a timeout', () => {
    expect(config.storeTimeoutMs).toBeGreaterThan(0);
  });
});
