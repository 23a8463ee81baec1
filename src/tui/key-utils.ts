export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/** terminal-kit reports printable keys by the character itself. */
export function isPrintableKeyName(name: string): boolean {
  if (isSpaceKeyName(name)) return true;
  const chars = Array.from(name);
  return chars.length === 1 && !/\p{Cc}/u.test(name);
}

export function isCancelKeyName(name: string): boolean {
  return name === 'ESCAPE' || name === 'CTRL_C';
}
