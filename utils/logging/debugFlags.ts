// Module-specific verbose logging switches.
// Flags come from DRAWING_COMPARE_DEBUG="DxfEntityExtractor,Comparator" or are set at runtime.
// In production, all debug flags are off and cannot be enabled

/**
 * Type for debug flag map
 */
export type DebugFlagMap = Record<string, boolean>;

const isProd = () => process.env.NODE_ENV === 'production';

let debugFlags: DebugFlagMap = loadEnvFlags();

function loadEnvFlags(): DebugFlagMap {
  const raw = process.env.DRAWING_COMPARE_DEBUG;
  if (!raw) return {};
  const map: DebugFlagMap = {};
  for (const flag of raw.split(',').map(f => f.trim()).filter(Boolean)) {
    map[flag] = true;
  }
  return map;
}

/**
 * Check if debug is enabled for a given module
 * @param module - The module name (e.g., 'DxfEntityExtractor')
 */
export function isDebugEnabled(module: string): boolean {
  if (isProd()) return false;
  return debugFlags[module] === true;
}

/**
 * Set debug flag for a module (dev only)
 */
export function setDebugFlag(module: string, enabled: boolean): void {
  if (isProd()) return;
  debugFlags[module] = enabled;
}

export function resetDebugFlags(): void {
  debugFlags = {};
}
