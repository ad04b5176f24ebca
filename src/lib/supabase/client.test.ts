import { afterEach, describe, expect, it, vi } from 'vitest';
import { getSupabase } from './client';

describe('getSupabase', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('creates one client from the server environment and reuses it', () => {
    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    vi.stubEnv('SUPABASE_SERVICE_KEY', 'test-service-key');
    vi.stubEnv('OS_PLACES_API_KEY', 'test-secret');

    const client = getSupabase();

    expect(typeof client.rpc).toBe('function');
    expect(getSupabase()).toBe(client);
  });
});
