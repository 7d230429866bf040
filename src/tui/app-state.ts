import { createTextInput, type TextInputState } from './text-input.js';

/**
 * `normal` navigates and quits; `editing` routes keys into the search field.
 * A results-navigation mode would be added here as a third member.
 */
export type InputMode = 'normal' | 'editing';

export interface AppState {
  mode: InputMode;
  exit: boolean;
  input: TextInputState;
  results: string[];
  /** Reserved for the list cursor; nothing assigns it yet. */
  selectedItem: string;
  /** One-shot status line shown in place of the key help until the next key press. */
  notice: string | null;
}

export function createAppState(): AppState {
  return {
    mode: 'normal',
    exit: false,
    input: createTextInput(''),
    results: [],
    selectedItem: '',
    notice: null,
  };
}
