import { ValidationError } from './errors.js';
import type { GenerationRequest, ResolutionTier, SupportedResolution } from './types.js';

export const MIN_DURATION_SECONDS = 1;
export const MAX_DURATION_SECONDS = 20;

// Enforced by the service, not locally
export const MAX_PENDING_JOBS = 1;

export const TIER_MAX_VARIANTS: Record<ResolutionTier, number> = {
  standard: 4,
  '720p': 2,
  '1080p': 1
};

export const SUPPORTED_RESOLUTIONS: readonly SupportedResolution[] = [
  { width: 480, height: 480, tier: 'standard', maxVariants: TIER_MAX_VARIANTS.standard },
  { width: 480, height: 854, tier: 'standard', maxVariants: TIER_MAX_VARIANTS.standard },
  { width: 854, height: 480, tier: 'standard', maxVariants: TIER_MAX_VARIANTS.standard },
  { width: 720, height: 720, tier: '720p', maxVariants: TIER_MAX_VARIANTS['720p'] },
  { width: 720, height: 1280, tier: '720p', maxVariants: TIER_MAX_VARIANTS['720p'] },
  { width: 1280, height: 720, tier: '720p', maxVariants: TIER_MAX_VARIANTS['720p'] },
  { width: 1080, height: 1080, tier: '1080p', maxVariants: TIER_MAX_VARIANTS['1080p'] },
  { width: 1080, height: 1920, tier: '1080p', maxVariants: TIER_MAX_VARIANTS['1080p'] },
  { width: 1920, height: 1080, tier: '1080p', maxVariants: TIER_MAX_VARIANTS['1080p'] }
];

export type ValidationResult =
  | { ok: true; resolution: SupportedResolution }
  | { ok: false; error: ValidationError };

export function findSupportedResolution(width: number, height: number): SupportedResolution | undefined {
  return SUPPORTED_RESOLUTIONS.find((entry) => entry.width === width && entry.height === height);
}

export function formatSupportedResolutions(): string {
  return SUPPORTED_RESOLUTIONS.map((entry) => `${entry.width}x${entry.height}`).join(', ');
}

export function getMaxVariantsForResolution(width: number, height: number): number | undefined {
  return findSupportedResolution(width, height)?.maxVariants;
}

// Every tier shares the same duration range
export function getMaxDurationForResolution(width: number, height: number): number | undefined {
  return findSupportedResolution(width, height) ? MAX_DURATION_SECONDS : undefined;
}

/**
 * Checks a request against the resolution table. Rules apply in order:
 * resolution, then duration, then variant count; the first failure wins.
 */
export function validateGenerationRequest(
  request: Pick<GenerationRequest, 'width' | 'height' | 'durationSeconds' | 'variantCount'>
): ValidationResult {
  const { width, height, durationSeconds, variantCount } = request;

  const resolution = findSupportedResolution(width, height);
  if (!resolution) {
    return {
      ok: false,
      error: new ValidationError(
        'UnsupportedResolution',
        'resolution',
        `Resolution ${width}x${height} is not supported. Supported resolutions: ${formatSupportedResolutions()}`
      )
    };
  }

  if (
    !Number.isInteger(durationSeconds) ||
    durationSeconds < MIN_DURATION_SECONDS ||
    durationSeconds > MAX_DURATION_SECONDS
  ) {
    return {
      ok: false,
      error: new ValidationError(
        'InvalidDuration',
        'durationSeconds',
        `Duration must be a whole number of seconds between ${MIN_DURATION_SECONDS} and ${MAX_DURATION_SECONDS}. Got ${durationSeconds}.`
      )
    };
  }

  if (!Number.isInteger(variantCount) || variantCount < 1 || variantCount > resolution.maxVariants) {
    return {
      ok: false,
      error: new ValidationError(
        'InvalidVariantCount',
        'variantCount',
        `${resolution.tier} resolutions support between 1 and ${resolution.maxVariants} variants. Got ${variantCount}.`
      )
    };
  }

  return { ok: true, resolution };
}

export function assertValidGenerationRequest<T extends GenerationRequest>(request: T): T {
  const result = validateGenerationRequest(request);
  if (!result.ok) {
    throw result.error;
  }
  return request;
}
