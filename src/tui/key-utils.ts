export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/**
 * terminal-kit reports printable keys by the character itself and everything
 * else by an upper-case name (`ENTER`, `CTRL_A`, ...).
 */
export function isPrintableKeyName(name: string): boolean {
  if (isSpaceKeyName(name)) return true;
  const chars = Array.from(name);
  if (chars.length !== 1) return false;
  return !/\p{C}/u.test(name);
}
