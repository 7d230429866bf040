import { describe, expect, it } from 'vitest';
import { isPrintableKeyName, isSpaceKeyName } from '../../src/tui/key-utils.js';

describe('isSpaceKeyName', () => {
  it('treats both SPACE and literal space as space', () => {
    expect(isSpaceKeyName('SPACE')).toBe(true);
    expect(isSpaceKeyName(' ')).toBe(true);
  });

  it('rejects non-space keys', () => {
    expect(isSpaceKeyName('ENTER')).toBe(false);
    expect(isSpaceKeyName('a')).toBe(false);
    expect(isSpaceKeyName('')).toBe(false);
  });
});

describe('isPrintableKeyName', () => {
  it('accepts single characters, including non-ASCII ones', () => {
    expect(isPrintableKeyName('a')).toBe(true);
    expect(isPrintableKeyName('Z')).toBe(true);
    expect(isPrintableKeyName('é')).toBe(true);
    expect(isPrintableKeyName('日')).toBe(true);
    expect(isPrintableKeyName('😀')).toBe(true);
    expect(isPrintableKeyName('SPACE')).toBe(true);
  });

  it('rejects named keys and control characters', () => {
    expect(isPrintableKeyName('ENTER')).toBe(false);
    expect(isPrintableKeyName('CTRL_A')).toBe(false);
    expect(isPrintableKeyName('F1')).toBe(false);
    expect(isPrintableKeyName('\u0001')).toBe(false);
    expect(isPrintableKeyName('')).toBe(false);
  });
});
