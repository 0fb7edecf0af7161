/**
 * Manager Store
 *
 * Observable snapshot of one TweenManager: how many units it runs, whether
 * it is paused, and the last tick it processed. The manager writes to it on
 * every update; consumers subscribe instead of polling the manager.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';

// =============================================================================
// Types
// =============================================================================

export interface ManagerStats {
  /** Root units currently managed */
  objectCount: number;
  /** Running tweens, nested ones included */
  tweenCount: number;
  /** Running timelines, nested ones included */
  timelineCount: number;
}

export interface ManagerState extends ManagerStats {
  managerId: string;
  isPaused: boolean;
  /** Number of update calls processed while not paused */
  tickCount: number;
  /** Delta of the last processed update, in milliseconds */
  lastDelta: number;
}

export interface ManagerActions {
  /** Record a processed update */
  recordTick: (delta: number, stats: ManagerStats) => void;
  /** Replace the counters without counting a tick */
  setStats: (stats: ManagerStats) => void;
  setPaused: (isPaused: boolean) => void;
  /** Clear counters, keeping the manager id */
  reset: () => void;
}

export type ManagerStore = ManagerState & ManagerActions;

export type ManagerStoreApi = ReturnType<typeof createManagerStore>;

// =============================================================================
// Store Factory
// =============================================================================

export function createManagerStore(managerId: string) {
  const initialState: ManagerState = {
    managerId,
    isPaused: false,
    objectCount: 0,
    tweenCount: 0,
    timelineCount: 0,
    tickCount: 0,
    lastDelta: 0,
  };

  return createStore<ManagerStore>()(
    immer((set) => ({
      ...initialState,

      recordTick: (delta, stats) => {
        set((state) => {
          state.tickCount += 1;
          state.lastDelta = delta;
          state.objectCount = stats.objectCount;
          state.tweenCount = stats.tweenCount;
          state.timelineCount = stats.timelineCount;
        });
      },

      setStats: (stats) => {
        set((state) => {
          state.objectCount = stats.objectCount;
          state.tweenCount = stats.tweenCount;
          state.timelineCount = stats.timelineCount;
        });
      },

      setPaused: (isPaused) => {
        set((state) => {
          state.isPaused = isPaused;
        });
      },

      reset: () => {
        set({ ...initialState });
      },
    }))
  );
}
