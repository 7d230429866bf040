import type { AppState } from './app-state.js';
import { applyTextInputKey } from './text-input.js';

export type KeyOutcome =
  | { kind: 'none' }
  | { kind: 'exit' }
  | { kind: 'modeChanged' }
  | { kind: 'edited' }
  | { kind: 'submit'; query: string };

/** Advertised in the help line for the future list cursor; no handler yet. */
export const RESERVED_NAVIGATION_KEYS: ReadonlySet<string> = new Set(['h', 'j', 'k', 'l']);

const NONE: KeyOutcome = { kind: 'none' };

function handleNormalKey(state: AppState, name: string): KeyOutcome {
  if (RESERVED_NAVIGATION_KEYS.has(name)) return NONE;
  switch (name) {
    case 'q':
    case 'ESCAPE':
      state.exit = true;
      return { kind: 'exit' };
    case 's':
      state.mode = 'editing';
      return { kind: 'modeChanged' };
    default:
      return NONE;
  }
}

function handleEditingKey(state: AppState, name: string): KeyOutcome {
  if (name === 'ENTER') {
    state.mode = 'normal';
    return { kind: 'submit', query: state.input.value };
  }
  if (name === 'ESCAPE') {
    state.mode = 'normal';
    return { kind: 'modeChanged' };
  }

  const next = applyTextInputKey(state.input, name);
  if (!next) return NONE;
  state.input = next;
  return { kind: 'edited' };
}

/**
 * Applies one key press to the application state. Never throws: keys that
 * mean nothing in the current mode are ignored.
 */
export function handleKey(state: AppState, name: string): KeyOutcome {
  state.notice = null;
  if (state.mode === 'editing') return handleEditingKey(state, name);
  return handleNormalKey(state, name);
}
