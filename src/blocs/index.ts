export { BlogBloc } from './blogBloc';
export type { BlogEvent, BlogState } from './blogBloc';
export { AuthBloc } from './authBloc';
export type { AuthEvent, AuthState } from './authBloc';
export { AppUserCubit } from './appUserCubit';
export type { AppUserState } from './appUserCubit';
