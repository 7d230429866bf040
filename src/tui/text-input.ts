import terminalKit from 'terminal-kit';
import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

export type TextInputEdit =
  | 'insert'
  | 'deleteBackward'
  | 'deleteForward'
  | 'deleteWordBackward'
  | 'deleteToStart'
  | 'deleteToEnd'
  | 'moveLeft'
  | 'moveRight'
  | 'moveWordLeft'
  | 'moveWordRight'
  | 'moveHome'
  | 'moveEnd';

const KEY_EDITS = new Map<string, TextInputEdit>([
  ['LEFT', 'moveLeft'],
  ['CTRL_B', 'moveLeft'],
  ['RIGHT', 'moveRight'],
  ['CTRL_F', 'moveRight'],
  ['HOME', 'moveHome'],
  ['CTRL_A', 'moveHome'],
  ['END', 'moveEnd'],
  ['CTRL_E', 'moveEnd'],
  ['CTRL_LEFT', 'moveWordLeft'],
  ['ALT_LEFT', 'moveWordLeft'],
  ['ALT_B', 'moveWordLeft'],
  ['CTRL_RIGHT', 'moveWordRight'],
  ['ALT_RIGHT', 'moveWordRight'],
  ['ALT_F', 'moveWordRight'],
  ['BACKSPACE', 'deleteBackward'],
  ['DELETE', 'deleteForward'],
  ['CTRL_D', 'deleteForward'],
  ['CTRL_W', 'deleteWordBackward'],
  ['ALT_BACKSPACE', 'deleteWordBackward'],
  ['CTRL_U', 'deleteToStart'],
  ['CTRL_K', 'deleteToEnd'],
]);

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(chars: readonly string[], cursor: number): number {
  return Math.max(0, Math.min(cursor, chars.length));
}

export function createTextInput(initial = ''): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

function isWhitespaceChar(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function wordStartBefore(chars: readonly string[], cursor: number): number {
  let i = cursor;
  while (i > 0 && isWhitespaceChar(chars[i - 1])) i--;
  while (i > 0 && !isWhitespaceChar(chars[i - 1])) i--;
  return i;
}

function wordEndAfter(chars: readonly string[], cursor: number): number {
  let i = cursor;
  while (i < chars.length && isWhitespaceChar(chars[i])) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i])) i++;
  return i;
}

function removeRange(chars: string[], from: number, to: number): TextInputState {
  if (to <= from) return { value: chars.join(''), cursor: from };
  chars.splice(from, to - from);
  return { value: chars.join(''), cursor: from };
}

/**
 * Applies one editing operation. Returns the input unchanged (same object)
 * when the operation has nothing to do, e.g. backspace at the start.
 */
export function editTextInput(state: TextInputState, edit: TextInputEdit, text = ''): TextInputState {
  const chars = toChars(state.value);
  const cursor = clampCursor(chars, state.cursor);

  switch (edit) {
    case 'insert': {
      const inserted = toChars(text);
      if (inserted.length === 0) return state;
      chars.splice(cursor, 0, ...inserted);
      return { value: chars.join(''), cursor: cursor + inserted.length };
    }
    case 'deleteBackward':
      if (cursor === 0) return state;
      return removeRange(chars, cursor - 1, cursor);
    case 'deleteForward':
      if (cursor >= chars.length) return state;
      return removeRange(chars, cursor, cursor + 1);
    case 'deleteWordBackward':
      return removeRange(chars, wordStartBefore(chars, cursor), cursor);
    case 'deleteToStart':
      return removeRange(chars, 0, cursor);
    case 'deleteToEnd':
      return removeRange(chars, cursor, chars.length);
    case 'moveLeft':
      return { value: state.value, cursor: Math.max(0, cursor - 1) };
    case 'moveRight':
      return { value: state.value, cursor: Math.min(chars.length, cursor + 1) };
    case 'moveWordLeft':
      return { value: state.value, cursor: wordStartBefore(chars, cursor) };
    case 'moveWordRight':
      return { value: state.value, cursor: wordEndAfter(chars, cursor) };
    case 'moveHome':
      return { value: state.value, cursor: 0 };
    case 'moveEnd':
      return { value: state.value, cursor: chars.length };
  }
}

/**
 * Maps a terminal-kit key name onto the buffer. Returns null for keys the
 * buffer does not understand (ENTER, ESCAPE, function keys, ...).
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const edit = KEY_EDITS.get(name);
  if (edit) return editTextInput(state, edit);
  if (isSpaceKeyName(name)) return editTextInput(state, 'insert', ' ');
  if (isPrintableKeyName(name)) return editTextInput(state, 'insert', name);
  return null;
}

function charWidth(ch: string): number {
  return terminalKit.stringWidth(ch);
}

/**
 * Display width of the text before the cursor.
 */
export function visualCursor(state: TextInputState): number {
  const chars = toChars(state.value);
  const cursor = clampCursor(chars, state.cursor);
  let width = 0;
  for (const ch of chars.slice(0, cursor)) width += charWidth(ch);
  return width;
}

/**
 * Horizontal offset (in columns) that keeps the cursor inside a viewport of
 * `width` columns: the smallest character-aligned offset with
 * `visualCursor - offset < width`.
 */
export function visualScroll(state: TextInputState, width: number): number {
  const target = Math.max(0, visualCursor(state) - Math.max(1, width) + 1);
  let scroll = 0;
  for (const ch of toChars(state.value)) {
    if (scroll >= target) break;
    scroll += charWidth(ch);
  }
  return scroll;
}

/**
 * Drops the leading characters that fill `columns` display columns.
 */
export function skipColumns(value: string, columns: number): string {
  const chars = toChars(value);
  let skipped = 0;
  let index = 0;
  while (index < chars.length && skipped < columns) {
    skipped += charWidth(chars[index] ?? '');
    index++;
  }
  return chars.slice(index).join('');
}
