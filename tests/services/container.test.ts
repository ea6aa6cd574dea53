/**
 * Tests for the service container's memoisation
 *
 * Initialisation is made to fail on a missing embedding key, so nothing is
 * ever constructed against a real backend.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { getServiceContainer, resetServiceContainer } from '../../lib/src/services/container.js';

describe('getServiceContainer', () => {
  beforeEach(() => {
    resetServiceContainer();
    vi.stubEnv('GOOGLE_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetServiceContainer();
  });

  it('shares one initialisation between concurrent callers', async () => {
    const first = getServiceContainer();
    const second = getServiceContainer();

    expect(second).toBe(first);
    await expect(first).rejects.toThrow('GOOGLE_API_KEY is required');
  });

  it('retries after a failed initialisation', async () => {
    const first = getServiceContainer();
    await expect(first).rejects.toThrow('GOOGLE_API_KEY is required');

    const second = getServiceContainer();
    expect(second).not.toBe(first);
    await expect(second).rejects.toThrow('GOOGLE_API_KEY is required');
  });
});
