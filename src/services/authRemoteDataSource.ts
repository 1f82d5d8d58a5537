import type { Session, SupabaseClient, User as SupabaseUser } from '@supabase/supabase-js';
import { User } from '../types/domain';
import { ServerException, toErrorMessage } from '../lib/errors';

export type SignUpCredentials = {
  email: string;
  password: string;
  name: string;
};

export type SignInCredentials = {
  email: string;
  password: string;
};

export interface AuthRemoteDataSource {
  getCurrentSession(): Promise<Session | null>;
  signUpWithEmailPassword(credentials: SignUpCredentials): Promise<User>;
  signInWithEmailPassword(credentials: SignInCredentials): Promise<User>;
  getCurrentUserData(): Promise<User | null>;
  signOut(): Promise<void>;
}

const toServerException = (context: string, error: unknown): ServerException => {
  if (error instanceof ServerException) return error;
  console.error(`${context}:`, error);
  return new ServerException(toErrorMessage(error));
};

export const mapAuthUser = (user: SupabaseUser): User => {
  const metadataName: unknown = user.user_metadata?.name;
  return {
    id: user.id,
    name: typeof metadataName === 'string' ? metadataName : '',
    email: user.email ?? '',
  };
};

export class SupabaseAuthRemoteDataSource implements AuthRemoteDataSource {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly profileTable: string
  ) {}

  async getCurrentSession(): Promise<Session | null> {
    const { data: { session }, error } = await this.supabase.auth.getSession();

    if (error) {
      throw toServerException('Error getting session', error);
    }

    return session;
  }

  async signUpWithEmailPassword({ email, password, name }: SignUpCredentials): Promise<User> {
    try {
      const { data, error } = await this.supabase.auth.signUp({
        email,
        password,
        options: {
          data: { name },
        },
      });

      if (error) {
        throw error;
      }

      if (!data.user) {
        throw new ServerException('User is null!');
      }

      return mapAuthUser(data.user);
    } catch (error) {
      throw toServerException('Error during sign up', error);
    }
  }

  async signInWithEmailPassword({ email, password }: SignInCredentials): Promise<User> {
    try {
      const { data, error } = await this.supabase.auth.signInWithPassword({
        email,
        password,
      });

      if (error) {
        throw error;
      }

      if (!data.user) {
        throw new ServerException('Invalid Credentials!');
      }

      return mapAuthUser(data.user);
    } catch (error) {
      throw toServerException('Error during sign in', error);
    }
  }

  /**
   * Profile row of the signed-in user, or null without a session
   */
  async getCurrentUserData(): Promise<User | null> {
    try {
      const session = await this.getCurrentSession();
      if (!session) {
        return null;
      }

      const { data, error } = await this.supabase
        .from(this.profileTable)
        .select('*')
        .eq('id', session.user.id)
        .maybeSingle();

      if (error) {
        throw error;
      }

      if (!data) {
        return null;
      }

      const profile: Record<string, unknown> = data;
      return {
        id: session.user.id,
        name: typeof profile.name === 'string' ? profile.name : '',
        email:
          typeof profile.email === 'string' ? profile.email : session.user.email ?? '',
      };
    } catch (error) {
      throw toServerException('Error fetching current user', error);
    }
  }

  async signOut(): Promise<void> {
    const { error } = await this.supabase.auth.signOut();

    if (error) {
      throw toServerException('Error signing out', error);
    }
  }
}
