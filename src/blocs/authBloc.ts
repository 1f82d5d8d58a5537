import { Bloc } from '../lib/bloc';
import { Result, User } from '../types/domain';
import { NO_PARAMS } from '../usecases/useCase';
import type { CurrentUser } from '../usecases/currentUser';
import type { UserSignIn } from '../usecases/userSignIn';
import type { UserSignOut } from '../usecases/userSignOut';
import type { UserSignUp } from '../usecases/userSignUp';
import type { SignInCredentials, SignUpCredentials } from '../services/authRepository';
import type { AppUserCubit } from './appUserCubit';

export type AuthEvent =
  | ({ type: 'signUp' } & SignUpCredentials)
  | ({ type: 'signIn' } & SignInCredentials)
  | { type: 'isUserLoggedIn' }
  | { type: 'signOut' };

export type AuthState =
  | { status: 'initial' }
  | { status: 'loading' }
  | { status: 'failure'; message: string }
  | { status: 'success'; user: User }
  | { status: 'signedOut' };

type AuthBlocDeps = {
  userSignUp: Pick<UserSignUp, 'call'>;
  userSignIn: Pick<UserSignIn, 'call'>;
  currentUser: Pick<CurrentUser, 'call'>;
  userSignOut: Pick<UserSignOut, 'call'>;
  appUserCubit: AppUserCubit;
};

export class AuthBloc extends Bloc<AuthEvent, AuthState> {
  private readonly deps: AuthBlocDeps;

  constructor(deps: AuthBlocDeps) {
    super({ status: 'initial' });
    this.deps = deps;
  }

  protected async onEvent(event: AuthEvent): Promise<void> {
    this.emit({ status: 'loading' });

    switch (event.type) {
      case 'signUp': {
        const { email, password, name } = event;
        return this.emitUserResult(await this.deps.userSignUp.call({ email, password, name }));
      }
      case 'signIn': {
        const { email, password } = event;
        return this.emitUserResult(await this.deps.userSignIn.call({ email, password }));
      }
      case 'isUserLoggedIn':
        return this.emitUserResult(await this.deps.currentUser.call(NO_PARAMS));
      case 'signOut': {
        const res = await this.deps.userSignOut.call(NO_PARAMS);
        if (!res.ok) {
          this.emit({ status: 'failure', message: res.error.message });
          return;
        }
        this.deps.appUserCubit.updateUser(null);
        this.emit({ status: 'signedOut' });
        return;
      }
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled auth event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private emitUserResult(res: Result<User>) {
    if (!res.ok) {
      this.emit({ status: 'failure', message: res.error.message });
      return;
    }
    this.deps.appUserCubit.updateUser(res.data);
    this.emit({ status: 'success', user: res.data });
  }
}
