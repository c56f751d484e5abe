import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { LoopProgress } from '../domain/execution'
import { Logger } from '../lib/logger'

export type RunPhase = 'idle' | 'planning' | 'running' | 'completed' | 'cancelled' | 'failed'

export interface RunState {
  phase: RunPhase
  status: string
  /** Summary of the order being run, used as context in error reports */
  info: string
  cycles: number
  unitsPlaced: number
  unitsRemaining: number
}

interface RunStore extends RunState {
  // Actions
  setInfo: (info: string) => void
  setStatus: (status: string) => void
  setPhase: (phase: RunPhase) => void
  recordProgress: (progress: LoopProgress) => void
  reset: () => void
}

const getInitialState = (): RunState => ({
  phase: 'idle',
  status: '',
  info: '',
  cycles: 0,
  unitsPlaced: 0,
  unitsRemaining: 0,
})

export function createRunStore() {
  return createStore<RunStore>()(
    subscribeWithSelector((set, get) => ({
      ...getInitialState(),

      setInfo: (info) => set({ info }),

      setStatus: (status) => set({ status }),

      setPhase: (phase) => {
        const previous = get().phase
        if (previous === phase) return
        Logger.add('run_phase', { from: previous, to: phase })
        set({ phase })
      },

      recordProgress: (progress) =>
        set({
          cycles: progress.cycle,
          unitsPlaced: progress.unitsPlaced,
          unitsRemaining: progress.unitsRemaining,
        }),

      reset: () => set(getInitialState()),
    }))
  )
}

export type RunStoreApi = ReturnType<typeof createRunStore>

export const runStore = createRunStore()
