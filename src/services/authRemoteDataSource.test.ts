import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSupabaseClient } from '../lib/supabaseClient';
import { ServerException } from '../lib/errors';
import { SupabaseAuthRemoteDataSource, mapAuthUser } from './authRemoteDataSource';
import {
  FakeResponse,
  RecordedRequest,
  TEST_ANON_KEY,
  TEST_SUPABASE_URL,
  createFakeFetch,
  wantsSingleObject,
} from '../__tests__/fakeFetch';

const authUser = {
  id: 'u1',
  aud: 'authenticated',
  role: 'authenticated',
  email: 'ada@example.com',
  app_metadata: { provider: 'email' },
  user_metadata: { name: 'Ada' },
  created_at: '2026-10-19T08:30:00.000Z',
};

const sessionBody = {
  access_token: 'test-access-token',
  token_type: 'bearer',
  expires_in: 3600,
  refresh_token: 'test-refresh-token',
  user: authUser,
};

const setup = (handler: (request: RecordedRequest) => FakeResponse) => {
  const backend = createFakeFetch(handler);
  const supabase = createSupabaseClient({
    supabaseUrl: TEST_SUPABASE_URL,
    supabaseAnonKey: TEST_ANON_KEY,
    fetch: backend.fetch,
  });
  return {
    dataSource: new SupabaseAuthRemoteDataSource(supabase, 'profiles'),
    requests: backend.requests,
  };
};

describe('mapAuthUser', () => {
  it('reads the display name from user metadata', () => {
    expect(
      mapAuthUser({
        id: 'u2',
        aud: 'authenticated',
        email: 'linus@example.com',
        app_metadata: {},
        user_metadata: {},
        created_at: '2026-10-19T08:30:00.000Z',
      })
    ).toEqual({ id: 'u2', name: '', email: 'linus@example.com' });
  });
});

describe('SupabaseAuthRemoteDataSource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('has no session before signing in', async () => {
    const { dataSource, requests } = setup(() => ({ status: 404 }));

    expect(await dataSource.getCurrentSession()).toBeNull();
    expect(await dataSource.getCurrentUserData()).toBeNull();
    expect(requests).toHaveLength(0);
  });

  it('signs in with email and password', async () => {
    const { dataSource, requests } = setup(() => ({ status: 200, body: sessionBody }));

    const user = await dataSource.signInWithEmailPassword({
      email: 'ada@example.com',
      password: 'test-password',
    });

    expect(user).toEqual({ id: 'u1', name: 'Ada', email: 'ada@example.com' });
    expect(requests[0].url.pathname).toBe('/auth/v1/token');
    expect(requests[0].url.searchParams.get('grant_type')).toBe('password');
    expect(requests[0].body).toMatchObject({
      email: 'ada@example.com',
      password: 'test-password',
    });

    const session = await dataSource.getCurrentSession();
    expect(session?.user.id).toBe('u1');
  });

  it('raises the auth error message when the credentials are rejected', async () => {
    const { dataSource } = setup(() => ({
      status: 400,
      body: { code: 400, error_code: 'invalid_credentials', msg: 'Invalid login credentials' },
    }));

    await expect(
      dataSource.signInWithEmailPassword({ email: 'ada@example.com', password: 'wrong' })
    ).rejects.toThrow(new ServerException('Invalid login credentials'));
  });

  it('loads the profile row of the signed-in user', async () => {
    const profile = { id: 'u1', name: 'Ada Lovelace' };
    const { dataSource, requests } = setup((request) => {
      if (request.url.pathname === '/auth/v1/token') {
        return { status: 200, body: sessionBody };
      }
      return { status: 200, body: wantsSingleObject(request) ? profile : [profile] };
    });

    await dataSource.signInWithEmailPassword({
      email: 'ada@example.com',
      password: 'test-password',
    });
    const user = await dataSource.getCurrentUserData();

    expect(user).toEqual({ id: 'u1', name: 'Ada Lovelace', email: 'ada@example.com' });
    const profileRequest = requests[1];
    expect(profileRequest.url.pathname).toBe('/rest/v1/profiles');
    expect(profileRequest.url.searchParams.get('id')).toBe('eq.u1');
    expect(profileRequest.headers.get('authorization')).toBe('Bearer test-access-token');
  });
});
