export const DEBUG_LEDSTRIP = process.env.DEBUG_LEDSTRIP === '1' || process.env.DEBUG_LEDSTRIP === 'true';

let debugLevel = Number.parseInt(process.env.DEBUG_LEDSTRIP_LEVEL || (DEBUG_LEDSTRIP ? '1' : '0'), 10) || 0;

export function getDebugLevel(): number {
  return debugLevel;
}

// Used by the CLI --verbose flag; env settings only apply at startup
export function setDebugLevel(level: number) {
  debugLevel = level;
}

export function dbg(...args: unknown[]) {
  if (debugLevel >= 1) console.log('[ledstrip]', ...args);
}
export function dbgV(...args: unknown[]) {
  if (debugLevel >= 2) console.log('[ledstrip]', ...args);
}
