import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

export type AppConfig = {
  supabaseUrl: string;
  supabaseAnonKey: string;
  blogTable: string;
  profileTable: string;
  blogImagesBucket: string;
  cacheDir: string;
  connectivityProbeUrls: string[];
  connectivityTimeoutMs: number;
};

const DEFAULT_PROBE_URLS = ['https://one.one.one.one', 'https://icanhazip.com/'];
const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
// Node fires timers above this delay immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

type Env = Record<string, string | undefined>;

export const loadEnvFile = (env: Env = process.env) => {
  const isProdEnv = env.APP_ENV === 'prod' || env.NODE_ENV === 'production';
  const envFile = isProdEnv ? '.env.prod' : '.env.dev';
  const envPath = path.resolve(process.cwd(), envFile);
  const envFileExists = fs.existsSync(envPath);

  if (envFileExists) {
    dotenv.config({ path: envPath });
  }

  return { envFile, envPath, envFileExists };
};

export const requiredEnv = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required env var: ${key}`);
  }
  return value;
};

const parseList = (value: string | undefined, fallback: string[]) => {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
};

const parseTimeout = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > MAX_TIMER_DELAY_MS) return fallback;
  return parsed;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  supabaseUrl: requiredEnv(env, 'SUPABASE_URL'),
  supabaseAnonKey: requiredEnv(env, 'SUPABASE_ANON_KEY'),
  blogTable: env.BLOG_TABLE || 'blogs',
  profileTable: env.PROFILE_TABLE || 'profiles',
  blogImagesBucket: env.BLOG_IMAGES_BUCKET || 'blog_images',
  cacheDir: path.resolve(process.cwd(), env.BLOG_CACHE_DIR || '.cache'),
  connectivityProbeUrls: parseList(env.CONNECTIVITY_PROBE_URLS, DEFAULT_PROBE_URLS),
  connectivityTimeoutMs: parseTimeout(env.CONNECTIVITY_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS),
});
