// Key names follow terminal-kit's `key` event: printable characters arrive as
// themselves, everything else as an upper-case name ('ENTER', 'CTRL_S', ...).

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

export function isPrintableKey(name: string): boolean {
  return Array.from(name).length === 1;
}

export function isDigitKey(name: string): boolean {
  return /^[0-9]$/.test(name);
}

/** Human-readable form of a key for status messages. */
export function describeKey(name: string): string {
  if (isSpaceKeyName(name)) return '<Space>';
  if (isPrintableKey(name)) return name;
  return `<${name}>`;
}
