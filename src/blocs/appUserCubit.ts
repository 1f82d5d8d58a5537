import { Cubit } from '../lib/bloc';
import { User } from '../types/domain';

export type AppUserState =
  | { status: 'initial' }
  | { status: 'loggedIn'; user: User };

/** The signed-in user, shared by every feature that needs an author id. */
export class AppUserCubit extends Cubit<AppUserState> {
  constructor() {
    super({ status: 'initial' });
  }

  updateUser(user: User | null): void {
    this.emit(user ? { status: 'loggedIn', user } : { status: 'initial' });
  }
}
