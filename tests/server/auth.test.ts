// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  getUser: vi.fn(),
  createServerClient: vi.fn(),
  setCookie: vi.fn()
}));

vi.mock('@supabase/ssr', () => ({
  createServerClient: mocks.createServerClient
}));

vi.mock('next/headers', () => ({
  cookies: () => ({
    getAll: () => [{ name: 'sb-session', value: 'cookie-value' }],
    set: mocks.setCookie
  })
}));

const originalEnv = { ...process.env };

describe('supabase auth', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    process.env.NEXT_PUBLIC_SUPABASE_URL = 'https://example.supabase.co';
    process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY = 'anon-key';
    mocks.createServerClient.mockReturnValue({ auth: { getUser: mocks.getUser } });
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('builds the server client from env and request cookies', async () => {
    const { createSupabaseServerClient } = await import('@/src/server/supabase/server');
    createSupabaseServerClient();

    expect(mocks.createServerClient).toHaveBeenCalledTimes(1);
    const [url, anonKey, options] = mocks.createServerClient.mock.calls[0] ?? [];
    expect(url).toBe('https://example.supabase.co');
    expect(anonKey).toBe('anon-key');
    expect(options.cookies.getAll()).toEqual([{ name: 'sb-session', value: 'cookie-value' }]);
    options.cookies.setAll([{ name: 'sb-session', value: 'next', options: { path: '/' } }]);
    expect(mocks.setCookie).toHaveBeenCalledWith('sb-session', 'next', { path: '/' });
  });

  it('throws a descriptive error without Supabase env', async () => {
    delete process.env.NEXT_PUBLIC_SUPABASE_URL;
    const { createSupabaseServerClient, isSupabaseConfigured } = await import('@/src/server/supabase/server');

    expect(isSupabaseConfigured()).toBe(false);
    expect(() => createSupabaseServerClient()).toThrow(/Supabase env missing/i);
    expect(mocks.createServerClient).not.toHaveBeenCalled();
  });

  it('reads trimmed Supabase env', async () => {
    const { readSupabaseEnv } = await import('@/src/server/supabase/server');

    expect(readSupabaseEnv({ NEXT_PUBLIC_SUPABASE_URL: ' https://example.supabase.co ', NEXT_PUBLIC_SUPABASE_ANON_KEY: 'anon-key' })).toEqual({
      url: 'https://example.supabase.co',
      anonKey: 'anon-key'
    });
    expect(readSupabaseEnv({ NEXT_PUBLIC_SUPABASE_URL: 'https://example.supabase.co', NEXT_PUBLIC_SUPABASE_ANON_KEY: ' ' })).toBeNull();
  });

  it('returns the signed-in user', async () => {
    mocks.getUser.mockResolvedValueOnce({ data: { user: { id: 'user-1', email: 'user@example.com' } }, error: null });
    const { requireUser } = await import('@/src/server/auth');

    await expect(requireUser()).resolves.toEqual({ id: 'user-1', email: 'user@example.com' });
  });

  it('rejects a missing session with 401', async () => {
    mocks.getUser.mockResolvedValueOnce({ data: { user: null }, error: new Error('Auth session missing!') });
    const { requireUser } = await import('@/src/server/auth');

    await expect(requireUser()).rejects.toMatchObject({ status: 401, code: 'UNAUTHORIZED', message: 'Sign in required' });
  });
});
