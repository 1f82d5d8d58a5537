import { useSyncExternalStore } from 'react';
import type { Cubit } from '../lib/bloc';

export const useBlocState = <S>(bloc: Cubit<S>): S =>
  useSyncExternalStore(bloc.subscribe, bloc.getState, bloc.getState);
