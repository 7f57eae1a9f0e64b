import { z } from 'zod';
import { ValidationError, VideoClientError } from './errors.js';
import type { GenerationRequest, WireGenerationPayload } from './types.js';

export function toWirePayload(request: GenerationRequest, deploymentName: string): WireGenerationPayload {
  return {
    model: deploymentName,
    prompt: request.prompt,
    height: String(request.height),
    width: String(request.width),
    n_seconds: String(request.durationSeconds),
    n_variants: String(request.variantCount)
  };
}

const integerString = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal integer string')
  .transform((value) => Number.parseInt(value, 10));

const wirePayloadSchema = z.object({
  model: z.string(),
  prompt: z.string(),
  height: integerString,
  width: integerString,
  n_seconds: integerString,
  n_variants: integerString
});

/**
 * Reads a wire payload back into its logical request. A numeric field that
 * is not a decimal integer string is reported against the matching field;
 * a bad model or prompt is a plain VideoClientError.
 */
export function fromWirePayload(payload: unknown): { deploymentName: string; request: GenerationRequest } {
  const parsed = wirePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const path = issue?.path.join('.') ?? '';
    const message = `Malformed payload field ${path}: ${issue?.message ?? 'invalid value'}`;
    if (path === 'n_seconds') {
      throw new ValidationError('InvalidDuration', 'durationSeconds', message);
    }
    if (path === 'n_variants') {
      throw new ValidationError('InvalidVariantCount', 'variantCount', message);
    }
    if (path === 'width' || path === 'height') {
      throw new ValidationError('UnsupportedResolution', 'resolution', message);
    }
    throw new VideoClientError(message);
  }

  const { model, prompt, height, width, n_seconds, n_variants } = parsed.data;
  return {
    deploymentName: model,
    request: {
      prompt,
      width,
      height,
      durationSeconds: n_seconds,
      variantCount: n_variants
    }
  };
}
