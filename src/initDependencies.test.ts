import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Dependencies, initDependencies } from './initDependencies';
import type { AppConfig } from './lib/config';
import { RecordedRequest, TEST_ANON_KEY, TEST_SUPABASE_URL, createFakeFetch } from './__tests__/fakeFetch';

const PROBE_URL = 'https://probe.test/';

const blogRow = {
  id: 'blog-1',
  poster_id: 'u1',
  title: 'Hello',
  content: 'World',
  image_url: `${TEST_SUPABASE_URL}/storage/v1/object/public/blog_images/blog-1`,
  topics: ['Tech'],
  updated_at: '2026-10-19T08:30:00.000Z',
};

describe('initDependencies', () => {
  let cacheDir: string;
  let online: boolean;
  let deps: Dependencies | null;
  let requests: RecordedRequest[];

  const init = async () => {
    const backend = createFakeFetch((request) => {
      if (request.url.href === PROBE_URL) {
        return { status: online ? 204 : 503 };
      }
      if (request.url.pathname === '/rest/v1/blogs') {
        return { status: 200, body: [{ ...blogRow, profiles: { name: 'Ada' } }] };
      }
      return { status: 404, body: { message: 'not found' } };
    });
    requests = backend.requests;

    const config: AppConfig = {
      supabaseUrl: TEST_SUPABASE_URL,
      supabaseAnonKey: TEST_ANON_KEY,
      blogTable: 'blogs',
      profileTable: 'profiles',
      blogImagesBucket: 'blog_images',
      cacheDir,
      connectivityProbeUrls: [PROBE_URL],
      connectivityTimeoutMs: 1000,
    };
    deps = await initDependencies({ config, fetch: backend.fetch });
    return deps;
  };

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blog-deps-'));
    online = true;
    deps = null;
  });

  afterEach(async () => {
    if (deps) {
      await deps.supabase.auth.stopAutoRefresh();
      deps.blogBloc.close();
      deps.authBloc.close();
    }
    await fs.rm(cacheDir, { recursive: true, force: true });
  });

  it('fetches blogs online and caches them on disk', async () => {
    const { blogBloc } = await init();

    await blogBloc.add({ type: 'fetchAll' });

    const expected = {
      id: 'blog-1',
      posterId: 'u1',
      title: 'Hello',
      content: 'World',
      imageUrl: blogRow.image_url,
      topics: ['Tech'],
      updatedAt: '2026-10-19T08:30:00.000Z',
      posterName: 'Ada',
    };
    expect(blogBloc.state).toEqual({ status: 'displaySuccess', blogs: [expected] });

    const cached = JSON.parse(await fs.readFile(path.join(cacheDir, 'blogs.json'), 'utf-8'));
    expect(cached).toEqual({ blogs: [{ ...blogRow, poster_name: 'Ada' }] });
  });

  it('serves the cached blogs after a restart without a connection', async () => {
    const first = await init();
    await first.blogBloc.add({ type: 'fetchAll' });
    await first.supabase.auth.stopAutoRefresh();

    online = false;
    const { blogBloc } = await init();
    const requestsBefore = requests.length;

    await blogBloc.add({ type: 'fetchAll' });

    expect(blogBloc.state).toMatchObject({
      status: 'displaySuccess',
      blogs: [{ id: 'blog-1', posterName: 'Ada' }],
    });
    expect(requests.slice(requestsBefore).map((request) => request.url.href)).toEqual([
      PROBE_URL,
    ]);
  });

  it('reports that nobody is signed in on a fresh install', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { authBloc, appUserCubit } = await init();

    await authBloc.add({ type: 'isUserLoggedIn' });

    expect(authBloc.state).toEqual({ status: 'failure', message: 'User not logged in!' });
    expect(appUserCubit.state).toEqual({ status: 'initial' });
  });
});
