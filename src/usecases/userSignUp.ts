import type { Result, User } from '../types/domain';
import type { AuthRepository, SignUpCredentials } from '../services/authRepository';
import type { UseCase } from './useCase';

export class UserSignUp implements UseCase<User, SignUpCredentials> {
  constructor(private readonly authRepository: AuthRepository) {}

  call(params: SignUpCredentials): Promise<Result<User>> {
    return this.authRepository.signUpWithEmailPassword(params);
  }
}
