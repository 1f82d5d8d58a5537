export * from './types/domain';
export { initDependencies } from './initDependencies';
export type { Dependencies } from './initDependencies';
export { loadConfig, loadEnvFile } from './lib/config';
export type { AppConfig } from './lib/config';
export { Bloc, Cubit } from './lib/bloc';
export { ServerException, CacheException } from './lib/errors';
export { HttpConnectionChecker } from './lib/connectionChecker';
export type { ConnectionChecker } from './lib/connectionChecker';
export * from './storage';
export * from './usecases';
export * from './blocs';
export * from './hooks';
export { AuthProvider, useAuth } from './contexts/AuthContext';
export * from './utils';
export type { BlogRepository, UploadBlogInput } from './services/blogRepository';
export type { AuthRepository } from './services/authRepository';
