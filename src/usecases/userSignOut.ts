import type { Result } from '../types/domain';
import type { AuthRepository } from '../services/authRepository';
import type { NoParams, UseCase } from './useCase';

export class UserSignOut implements UseCase<null, NoParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  call(_params: NoParams): Promise<Result<null>> {
    return this.authRepository.signOut();
  }
}
