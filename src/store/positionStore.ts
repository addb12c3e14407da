import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Position } from '../types/geo';

export interface PositionState {
  /** Latest device position */
  position: Position | null;
  /** Override set while a simulation runs */
  simulatedPosition: Position | null;

  setPosition: (position: Position | null) => void;
  setSimulatedPosition: (position: Position | null) => void;
}

export type PositionStore = StoreApi<PositionState>;

export function createPositionStore(initial: Position | null = null): PositionStore {
  return createStore<PositionState>((set) => ({
    position: initial,
    simulatedPosition: null,
    setPosition: (position) => set({ position }),
    setSimulatedPosition: (simulatedPosition) => set({ simulatedPosition }),
  }));
}

/** Effective observer position: the simulated one wins */
export function currentPosition(store: PositionStore): Position | null {
  const { position, simulatedPosition } = store.getState();
  return simulatedPosition ?? position;
}

/** Subscribe to effective-position changes only */
export function subscribeToPosition(
  store: PositionStore,
  listener: (position: Position | null) => void,
): () => void {
  return store.subscribe((state, prev) => {
    const next = state.simulatedPosition ?? state.position;
    const before = prev.simulatedPosition ?? prev.position;
    if (next !== before) listener(next);
  });
}

export const positionStore = createPositionStore();
