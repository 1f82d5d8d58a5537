import type { SupabaseClient } from '@supabase/supabase-js';
import { AppConfig, loadConfig, loadEnvFile } from './lib/config';
import { createSupabaseClient } from './lib/supabaseClient';
import { ConnectionChecker, HttpConnectionChecker } from './lib/connectionChecker';
import { createAuthStorage, createStorageAdapter } from './storage';
import { SupabaseBlogRemoteDataSource } from './services/blogRemoteDataSource';
import { StorageBlogLocalDataSource } from './services/blogLocalDataSource';
import { BlogRepositoryImpl } from './services/blogRepository';
import { SupabaseAuthRemoteDataSource } from './services/authRemoteDataSource';
import { AuthRepositoryImpl } from './services/authRepository';
import { UploadBlog } from './usecases/uploadBlog';
import { GetAllBlogs } from './usecases/getAllBlogs';
import { UserSignUp } from './usecases/userSignUp';
import { UserSignIn } from './usecases/userSignIn';
import { CurrentUser } from './usecases/currentUser';
import { UserSignOut } from './usecases/userSignOut';
import { BlogBloc } from './blocs/blogBloc';
import { AuthBloc } from './blocs/authBloc';
import { AppUserCubit } from './blocs/appUserCubit';

export const BLOGS_BOX = 'blogs';
export const SESSION_BOX = 'session';

export type Dependencies = {
  config: AppConfig;
  supabase: SupabaseClient;
  connectionChecker: ConnectionChecker;
  appUserCubit: AppUserCubit;
  authBloc: AuthBloc;
  blogBloc: BlogBloc;
};

type InitOptions = {
  config?: AppConfig;
  /** Replaces global fetch for the backend client and the connectivity probe. */
  fetch?: typeof fetch;
};

/**
 * Composition root: opens the storage boxes and builds every layer once.
 */
export const initDependencies = async ({
  config,
  fetch: customFetch,
}: InitOptions = {}): Promise<Dependencies> => {
  let resolvedConfig = config;
  if (!resolvedConfig) {
    loadEnvFile();
    resolvedConfig = loadConfig();
  }

  const blogsBox = await createStorageAdapter(resolvedConfig.cacheDir, BLOGS_BOX);
  const sessionBox = await createStorageAdapter(resolvedConfig.cacheDir, SESSION_BOX);

  const supabase = createSupabaseClient({
    supabaseUrl: resolvedConfig.supabaseUrl,
    supabaseAnonKey: resolvedConfig.supabaseAnonKey,
    authStorage: createAuthStorage(sessionBox),
    fetch: customFetch,
  });

  const connectionChecker = new HttpConnectionChecker({
    probeUrls: resolvedConfig.connectivityProbeUrls,
    timeoutMs: resolvedConfig.connectivityTimeoutMs,
    fetch: customFetch,
  });

  // Auth
  const authRepository = new AuthRepositoryImpl(
    new SupabaseAuthRemoteDataSource(supabase, resolvedConfig.profileTable),
    connectionChecker
  );
  const appUserCubit = new AppUserCubit();
  const authBloc = new AuthBloc({
    userSignUp: new UserSignUp(authRepository),
    userSignIn: new UserSignIn(authRepository),
    currentUser: new CurrentUser(authRepository),
    userSignOut: new UserSignOut(authRepository),
    appUserCubit,
  });

  // Blog
  const blogRepository = new BlogRepositoryImpl({
    remote: new SupabaseBlogRemoteDataSource(supabase, {
      blogTable: resolvedConfig.blogTable,
      profileTable: resolvedConfig.profileTable,
      imagesBucket: resolvedConfig.blogImagesBucket,
    }),
    local: new StorageBlogLocalDataSource(blogsBox),
    connectionChecker,
  });
  const blogBloc = new BlogBloc({
    uploadBlog: new UploadBlog(blogRepository),
    getAllBlogs: new GetAllBlogs(blogRepository),
  });

  return {
    config: resolvedConfig,
    supabase,
    connectionChecker,
    appUserCubit,
    authBloc,
    blogBloc,
  };
};
