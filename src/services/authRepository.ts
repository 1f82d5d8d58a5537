import { Result, User, failure, success } from '../types/domain';
import type { ConnectionChecker } from '../lib/connectionChecker';
import { toErrorMessage } from '../lib/errors';
import type {
  AuthRemoteDataSource,
  SignInCredentials,
  SignUpCredentials,
} from './authRemoteDataSource';

export type { SignInCredentials, SignUpCredentials } from './authRemoteDataSource';

export const UNKNOWN_ERROR_MESSAGE = 'An unknown error occurred';
export const NOT_LOGGED_IN_MESSAGE = 'User not logged in!';
export const NO_CONNECTION_MESSAGE = 'No internet connection!';

export interface AuthRepository {
  getCurrentUser(): Promise<Result<User>>;
  signInWithEmailPassword(credentials: SignInCredentials): Promise<Result<User>>;
  signUpWithEmailPassword(credentials: SignUpCredentials): Promise<Result<User>>;
  signOut(): Promise<Result<null>>;
}

const messageOf = (error: unknown) => toErrorMessage(error) || UNKNOWN_ERROR_MESSAGE;

export class AuthRepositoryImpl implements AuthRepository {
  constructor(
    private readonly remote: AuthRemoteDataSource,
    private readonly connectionChecker: ConnectionChecker
  ) {}

  /**
   * Offline, the stored session is trusted and the profile name is left empty.
   */
  async getCurrentUser(): Promise<Result<User>> {
    try {
      if (!(await this.connectionChecker.isConnected())) {
        const session = await this.remote.getCurrentSession();

        if (!session) {
          return failure(NOT_LOGGED_IN_MESSAGE);
        }

        return success({
          id: session.user.id,
          name: '',
          email: session.user.email ?? '',
        });
      }

      const user = await this.remote.getCurrentUserData();

      if (!user) {
        return failure(NOT_LOGGED_IN_MESSAGE);
      }

      return success(user);
    } catch (error) {
      return failure(messageOf(error));
    }
  }

  signInWithEmailPassword(credentials: SignInCredentials): Promise<Result<User>> {
    return this.getUser(() => this.remote.signInWithEmailPassword(credentials));
  }

  signUpWithEmailPassword(credentials: SignUpCredentials): Promise<Result<User>> {
    return this.getUser(() => this.remote.signUpWithEmailPassword(credentials));
  }

  async signOut(): Promise<Result<null>> {
    try {
      await this.remote.signOut();
      return success(null);
    } catch (error) {
      return failure(messageOf(error));
    }
  }

  private async getUser(fn: () => Promise<User>): Promise<Result<User>> {
    try {
      if (!(await this.connectionChecker.isConnected())) {
        return failure(NO_CONNECTION_MESSAGE);
      }

      return success(await fn());
    } catch (error) {
      return failure(messageOf(error));
    }
  }
}
