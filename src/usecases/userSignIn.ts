import type { Result, User } from '../types/domain';
import type { AuthRepository, SignInCredentials } from '../services/authRepository';
import type { UseCase } from './useCase';

export class UserSignIn implements UseCase<User, SignInCredentials> {
  constructor(private readonly authRepository: AuthRepository) {}

  call(params: SignInCredentials): Promise<Result<User>> {
    return this.authRepository.signInWithEmailPassword(params);
  }
}
