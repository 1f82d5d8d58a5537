import React, { createContext, useCallback, useContext, useEffect, useMemo } from 'react';
import type { AuthBloc } from '../blocs/authBloc';
import type { AppUserCubit } from '../blocs/appUserCubit';
import type { SignInCredentials, SignUpCredentials } from '../services/authRepository';
import { User } from '../types/domain';
import { useBlocState } from '../hooks/useBlocState';

type AuthContextType = {
  user: User | null;
  isLoading: boolean;
  isAuthenticated: boolean;
  error: string | null;
  signIn: (credentials: SignInCredentials) => Promise<void>;
  signUp: (credentials: SignUpCredentials) => Promise<void>;
  signOut: () => Promise<void>;
};

const AuthContext = createContext<AuthContextType | null>(null);

export const useAuth = () => {
  const context = useContext(AuthContext);
  if (!context) {
    throw new Error('useAuth must be used within AuthProvider');
  }
  return context;
};

type AuthProviderProps = {
  authBloc: AuthBloc;
  appUserCubit: AppUserCubit;
  children: React.ReactNode;
};

export const AuthProvider: React.FC<AuthProviderProps> = ({
  authBloc,
  appUserCubit,
  children,
}) => {
  const authState = useBlocState(authBloc);
  const appUser = useBlocState(appUserCubit);

  useEffect(() => {
    // Check for an existing session on mount
    void authBloc.add({ type: 'isUserLoggedIn' });
  }, [authBloc]);

  const signIn = useCallback(
    (credentials: SignInCredentials) => authBloc.add({ type: 'signIn', ...credentials }),
    [authBloc]
  );

  const signUp = useCallback(
    (credentials: SignUpCredentials) => authBloc.add({ type: 'signUp', ...credentials }),
    [authBloc]
  );

  const signOut = useCallback(() => authBloc.add({ type: 'signOut' }), [authBloc]);

  const value = useMemo(() => {
    const user = appUser.status === 'loggedIn' ? appUser.user : null;
    return {
      user,
      isLoading: authState.status === 'initial' || authState.status === 'loading',
      isAuthenticated: !!user,
      error: authState.status === 'failure' ? authState.message : null,
      signIn,
      signUp,
      signOut,
    };
  }, [appUser, authState, signIn, signUp, signOut]);

  return <AuthContext.Provider value={value}>{children}</AuthContext.Provider>;
};
