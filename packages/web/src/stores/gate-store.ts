import { create } from 'zustand';
import { toUserSignal } from '@content-gate/shared';
import type { ContentBundle, ContentGate, GateState, UserSignal } from '@content-gate/shared';

export interface GateStoreState {
  tier: string;
  status: GateState<ContentBundle>['status'];
  content: ContentBundle | null;
  isChecking: boolean;
  /** Last visitor-facing outcome, cleared on the next submit */
  signal: UserSignal | null;
  cooldownSeconds: number;

  // Actions
  submit: (password: string) => Promise<boolean>;
  logout: () => void;
  /** Page interaction: expires a stale session, refreshes the countdown */
  touch: () => void;
  dispose: () => void;
}

export type GateStore = ReturnType<typeof createGateStore>;

/**
 * One store per tier, mirroring a ContentGate
 */
export function createGateStore(gate: ContentGate<ContentBundle>) {
  const snapshot = (state: GateState<ContentBundle>) => ({
    status: state.status,
    content: state.status === 'unlocked' ? state.content : null,
    cooldownSeconds: gate.cooldownSeconds(),
  });

  const store = create<GateStoreState>()((set, get) => ({
    tier: gate.tier,
    ...snapshot(gate.getState()),
    isChecking: false,
    signal: null,

    submit: async (password: string) => {
      if (get().isChecking || !password) return false;
      set({ isChecking: true, signal: null });

      try {
        const result = await gate.attempt(password);
        const signal = toUserSignal(result);
        set({ signal: signal.type === 'busy' || signal.type === 'aborted' ? null : signal });
        return result.kind === 'unlocked';
      } finally {
        set({ isChecking: false, cooldownSeconds: gate.cooldownSeconds() });
      }
    },

    logout: () => {
      gate.logout();
      set({ signal: null });
    },

    touch: () => {
      gate.checkSession();
      const cooldownSeconds = gate.cooldownSeconds();
      const { signal } = get();
      set({
        cooldownSeconds,
        signal: signal?.type === 'cooling' && cooldownSeconds === 0 ? null : signal,
      });
    },

    dispose: () => {
      unsubscribe();
      gate.dispose();
    },
  }));

  const unsubscribe = gate.subscribe((state) => store.setState(snapshot(state)));

  return store;
}
