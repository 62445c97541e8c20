import { z } from 'zod';
import { DetectionPresetName, EngineConfig } from '../../types';
import { DEFAULT_ENGINE_CONFIG, DETECTION_PRESETS } from './presets';

const threshold = z.number().min(0).max(1);

export const EngineConfigSchema = z.object({
  confidenceThreshold: threshold,
  iouThreshold: threshold,
  maxDetections: z.number().int().positive(),
  allowedClasses: z.array(z.string().min(1)).optional(),
  resetIdentityCounter: z.boolean(),
  processEveryNFrames: z.number().int().positive(),
  metersPerPixel: z.number().positive().finite().optional(),
  logDetections: z.boolean()
});

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Merge overrides (or a named preset) onto the defaults and validate the result.
 */
export function resolveEngineConfig(
  overrides: Partial<EngineConfig> | DetectionPresetName = {}
): EngineConfig {
  const partial = typeof overrides === 'string' ? DETECTION_PRESETS[overrides] : overrides;
  const result = EngineConfigSchema.safeParse({ ...DEFAULT_ENGINE_CONFIG, ...partial });

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
