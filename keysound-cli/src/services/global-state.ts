import type { GlobalState, Group } from '../types/soundboard.js';

export function createGlobalState(overrides: Partial<GlobalState> = {}): GlobalState {
  return { loopFlag: false, stackFlag: false, ...overrides };
}

/** Flip the loop flag and return its new value. */
export function toggleLoop(state: GlobalState): boolean {
  state.loopFlag = !state.loopFlag;
  return state.loopFlag;
}

/** Flip the stack flag and return its new value. */
export function toggleStack(state: GlobalState): boolean {
  state.stackFlag = !state.stackFlag;
  return state.stackFlag;
}

/**
 * Copy the global flags into a group at trigger time. The group keeps these
 * values until its next trigger, whatever the globals do meanwhile.
 */
export function snapshotInto(group: Group, state: GlobalState): void {
  group.loopEnabled = state.loopFlag;
  group.stackEnabled = state.stackFlag;
  if (group.mode !== 'random') {
    group.mode = state.stackFlag ? 'parallel' : 'sequential';
  }
}
