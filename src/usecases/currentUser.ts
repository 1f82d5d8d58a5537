import type { Result, User } from '../types/domain';
import type { AuthRepository } from '../services/authRepository';
import type { NoParams, UseCase } from './useCase';

export class CurrentUser implements UseCase<User, NoParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  call(_params: NoParams): Promise<Result<User>> {
    return this.authRepository.getCurrentUser();
  }
}
