import type { Result } from '../types/domain';

export interface UseCase<T, P> {
  call(params: P): Promise<Result<T>>;
}

export const NO_PARAMS = Object.freeze({ kind: 'no-params' } as const);

/** Shared input of every use case that takes nothing. */
export type NoParams = typeof NO_PARAMS;
