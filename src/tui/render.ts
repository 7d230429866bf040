import type { AppState } from './app-state.js';
import { DEFAULT_STYLE, Frame, type Alignment, type CellStyle } from './frame.js';
import { computeFrameLayout, inputViewportWidth, type FrameSize, type Rect } from './layout.js';
import { skipColumns, visualCursor, visualScroll } from './text-input.js';

export const TITLE_TEXT = ' ytui - youtube search in the terminal ';
export const SEARCH_BOX_TITLE = ' Search ';
export const RESULTS_BOX_TITLE = ' Youtube videos ';
export const HELP_TEXT =
  'h - move left, j - move down, k - move up, l - move right , s - enter search mode, esc - exit search mode';

export interface RenderOptions {
  colorsDisabled: boolean;
}

const BORDER = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
} as const;

/**
 * Draws the border around `area` with `title` on the top edge and returns the
 * inner rectangle.
 */
function drawBorderedBlock(frame: Frame, area: Rect, title: string, titleAlignment: Alignment, style: CellStyle): Rect {
  if (area.width <= 0 || area.height <= 0) return { ...area, width: 0, height: 0 };

  const right = area.x + area.width - 1;
  const bottom = area.y + area.height - 1;

  for (let x = area.x; x <= right; x++) {
    frame.setString(x, area.y, BORDER.horizontal, style, 1);
    frame.setString(x, bottom, BORDER.horizontal, style, 1);
  }
  for (let y = area.y; y <= bottom; y++) {
    frame.setString(area.x, y, BORDER.vertical, style, 1);
    frame.setString(right, y, BORDER.vertical, style, 1);
  }
  frame.setString(area.x, area.y, BORDER.topLeft, style, 1);
  frame.setString(right, area.y, BORDER.topRight, style, 1);
  frame.setString(area.x, bottom, BORDER.bottomLeft, style, 1);
  frame.setString(right, bottom, BORDER.bottomRight, style, 1);

  const titleArea: Rect = { x: area.x + 1, y: area.y, width: Math.max(0, area.width - 2), height: 1 };
  frame.setAlignedString(titleArea, area.y, title, style, titleAlignment);

  return {
    x: area.x + 1,
    y: area.y + 1,
    width: Math.max(0, area.width - 2),
    height: Math.max(0, area.height - 2),
  };
}

function renderTitle(frame: Frame, area: Rect): void {
  if (area.height <= 0) return;
  frame.setAlignedString(area, area.y, TITLE_TEXT, DEFAULT_STYLE, 'center');
}

function renderSearchBox(frame: Frame, area: Rect, state: AppState, options: RenderOptions): void {
  if (area.height <= 0) return;

  const editing = state.mode === 'editing';
  const style: CellStyle = editing && !options.colorsDisabled ? { fg: 'yellow' } : DEFAULT_STYLE;
  frame.setStyle(area, style);

  const inner = drawBorderedBlock(frame, area, SEARCH_BOX_TITLE, 'left', style);
  // One column of horizontal padding on each side.
  const text: Rect = { x: inner.x + 1, y: inner.y, width: Math.max(0, inner.width - 2), height: inner.height };

  const scroll = visualScroll(state.input, inputViewportWidth(area));
  if (text.height > 0 && text.width > 0) {
    frame.setString(text.x, text.y, skipColumns(state.input.value, scroll), style, text.width);
  }

  if (editing) {
    frame.cursor = {
      x: area.x + (Math.max(visualCursor(state.input), scroll) - scroll) + 2,
      y: area.y + 1,
    };
  }
}

function renderResults(frame: Frame, area: Rect, state: AppState): void {
  const inner = drawBorderedBlock(frame, area, RESULTS_BOX_TITLE, 'center', DEFAULT_STYLE);
  state.results.slice(0, inner.height).forEach((item, index) => {
    frame.setString(inner.x, inner.y + index, item, DEFAULT_STYLE, inner.width);
  });
}

function renderHelp(frame: Frame, area: Rect, state: AppState): void {
  if (area.height <= 0) return;
  frame.setAlignedString(area, area.y, state.notice ?? HELP_TEXT, DEFAULT_STYLE, 'center');
}

/**
 * Projects the application state onto a new frame. Reads `state` only; the
 * cursor stays hidden unless the search field is being edited.
 */
export function renderFrame(state: AppState, size: FrameSize, options: RenderOptions): Frame {
  const frame = new Frame(size);
  const layout = computeFrameLayout(size);

  renderTitle(frame, layout.title);
  renderSearchBox(frame, layout.inputBox, state, options);
  renderResults(frame, layout.content, state);
  renderHelp(frame, layout.help, state);

  return frame;
}
