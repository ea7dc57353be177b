/**
 * Feature Flags Configuration
 * Read from the environment on each call so a loaded .env file or a test
 * override takes effect immediately
 */

export interface FeatureFlags {
  debugValuation: boolean;
}

const defaultFlags: FeatureFlags = {
  debugValuation: false
};

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw.toLowerCase() === 'true' || raw === '1';
}

export function getFeatureFlags(): FeatureFlags {
  return {
    debugValuation: readFlag('DEBUG_VALUATION', defaultFlags.debugValuation)
  };
}

/**
 * Check if per-run valuation detail should be logged
 */
export function isDebugMode(): boolean {
  return getFeatureFlags().debugValuation;
}
