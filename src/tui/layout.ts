export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FrameSize {
  width: number;
  height: number;
}

export type Constraint = { length: number } | { fill: number };

export interface FrameLayout {
  title: Rect;
  inputBox: Rect;
  content: Rect;
  help: Rect;
}

export const TITLE_HEIGHT = 1;
export const INPUT_BOX_HEIGHT = 3;
export const HELP_HEIGHT = 1;

/**
 * Splits `area` top to bottom. Fixed lengths are served first, in order;
 * fills share what is left by weight. When the area is too short, the later
 * fixed regions are clipped to zero height.
 */
export function splitVertical(area: Rect, constraints: readonly Constraint[]): Rect[] {
  const heights = constraints.map(() => 0);
  let remaining = Math.max(0, area.height);

  constraints.forEach((constraint, index) => {
    if (!('length' in constraint)) return;
    const height = Math.min(Math.max(0, constraint.length), remaining);
    heights[index] = height;
    remaining -= height;
  });

  const totalWeight = constraints.reduce((sum, c) => sum + ('fill' in c ? Math.max(0, c.fill) : 0), 0);
  if (totalWeight > 0) {
    let leftover = remaining;
    let lastFill = -1;
    constraints.forEach((constraint, index) => {
      if (!('fill' in constraint)) return;
      const height = Math.floor((remaining * Math.max(0, constraint.fill)) / totalWeight);
      heights[index] = height;
      leftover -= height;
      lastFill = index;
    });
    // Rounding remainder goes to the last fill.
    if (lastFill >= 0) heights[lastFill] = (heights[lastFill] ?? 0) + leftover;
  }

  const rects: Rect[] = [];
  let y = area.y;
  for (const height of heights) {
    rects.push({ x: area.x, y, width: Math.max(0, area.width), height });
    y += height;
  }
  return rects;
}

export function computeFrameLayout(size: FrameSize): FrameLayout {
  const [title, inputBox, content, help] = splitVertical(
    { x: 0, y: 0, width: size.width, height: size.height },
    [{ length: TITLE_HEIGHT }, { length: INPUT_BOX_HEIGHT }, { fill: 1 }, { length: HELP_HEIGHT }]
  );
  const empty: Rect = { x: 0, y: 0, width: 0, height: 0 };
  return {
    title: title ?? empty,
    inputBox: inputBox ?? empty,
    content: content ?? empty,
    help: help ?? empty,
  };
}

/**
 * Columns available to the search text: two for the borders, one for the
 * cursor, two for the padding.
 */
export function inputViewportWidth(inputBox: Rect): number {
  return Math.max(1, Math.max(3, inputBox.width) - 3 - 2);
}
