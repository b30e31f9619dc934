import type { CsrfState, StateStore } from '../types.js';

/**
 * Single-session store that counts its calls
 */
export class RecordingStateStore implements StateStore {
  public pending: CsrfState | undefined;
  public readonly stored: CsrfState[] = [];
  public clears = 0;

  constructor(pending?: CsrfState) {
    this.pending = pending;
  }

  async store(state: CsrfState): Promise<void> {
    this.stored.push(state);
    this.pending = state;
  }

  async loadAndClear(): Promise<CsrfState | undefined> {
    this.clears++;
    const state = this.pending;
    this.pending = undefined;
    return state;
  }
}
