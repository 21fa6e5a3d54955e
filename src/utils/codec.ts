// Byte helpers for the strip's frame formats

export function hex(buf: Uint8Array): string {
  return [...buf].map(b => b.toString(16).padStart(2, '0')).join(' ');
}

export function xorChecksum(bytes: Uint8Array): number {
  return bytes.reduce((acc, b) => acc ^ b, 0) & 0xff;
}

/**
 * BLE libraries disagree on UUID spelling ("0000ff01-0000-..." vs "0000ff010000..."),
 * compare the normalized form
 */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}
