/**
 * Detection configuration
 */

export interface DetectionConfig {
  /** Throw UnterminatedBlockError instead of recovering to end of document (default: false) */
  strict: boolean;

  /** Split Markdown runs at blank lines (default: false) */
  paragraphBreaks: boolean;
}

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  strict: false,
  paragraphBreaks: false,
};

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return fallback;
}

/**
 * Parse detection config from environment variables
 */
export function parseDetectionConfig(env: NodeJS.ProcessEnv = process.env): DetectionConfig {
  return {
    strict: parseFlag(env.HYBRIDNOTE_STRICT_DETECTION, DEFAULT_DETECTION_CONFIG.strict),
    paragraphBreaks: parseFlag(env.HYBRIDNOTE_PARAGRAPH_BREAKS, DEFAULT_DETECTION_CONFIG.paragraphBreaks),
  };
}
