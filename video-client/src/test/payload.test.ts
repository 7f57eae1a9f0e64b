import { describe, it, expect } from 'vitest';
import { ValidationError, VideoClientError } from '../errors.js';
import { fromWirePayload, toWirePayload } from '../payload.js';
import type { GenerationRequest } from '../types.js';
import { validateGenerationRequest } from '../validation.js';

describe('toWirePayload', () => {
  it('serialises numeric fields as strings and carries the deployment as model', () => {
    const request: GenerationRequest = { prompt: 'test', width: 480, height: 480, durationSeconds: 5, variantCount: 1 };

    expect(validateGenerationRequest(request).ok).toBe(true);
    expect(toWirePayload(request, 'sora-test')).toEqual({
      model: 'sora-test',
      prompt: 'test',
      height: '480',
      width: '480',
      n_seconds: '5',
      n_variants: '1'
    });
  });

  it('keeps the wire field order', () => {
    const payload = toWirePayload(
      { prompt: 'city at night', width: 1920, height: 1080, durationSeconds: 20, variantCount: 1 },
      'sora'
    );
    expect(JSON.stringify(payload)).toBe(
      '{"model":"sora","prompt":"city at night","height":"1080","width":"1920","n_seconds":"20","n_variants":"1"}'
    );
  });
});

describe('fromWirePayload', () => {
  it('reads back the logical request', () => {
    const request: GenerationRequest = {
      prompt: 'waves on a beach',
      width: 1280,
      height: 720,
      durationSeconds: 12,
      variantCount: 2
    };

    const parsed = fromWirePayload(toWirePayload(request, 'sora-test'));

    expect(parsed.deploymentName).toBe('sora-test');
    expect(parsed.request).toEqual(request);
  });

  it('rejects a non-integer duration string', () => {
    const payload = { ...toWirePayload({ prompt: 'x', width: 480, height: 480, durationSeconds: 5, variantCount: 1 }, 'm'), n_seconds: '5.5' };

    try {
      fromWirePayload(payload);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('InvalidDuration');
        expect(error.message).toBe('Malformed payload field n_seconds: Expected a decimal integer string');
      }
    }
  });

  it('rejects a non-numeric width string as a resolution error', () => {
    const payload = { ...toWirePayload({ prompt: 'x', width: 480, height: 480, durationSeconds: 5, variantCount: 1 }, 'm'), width: 'wide' };
    expect(() => fromWirePayload(payload)).toThrow(ValidationError);
  });

  it('reports a missing prompt against the prompt field, not as a validation code', () => {
    const payload = { ...toWirePayload({ prompt: 'x', width: 480, height: 480, durationSeconds: 5, variantCount: 1 }, 'm'), prompt: undefined };

    try {
      fromWirePayload(payload);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(VideoClientError);
      expect(error).not.toBeInstanceOf(ValidationError);
      if (error instanceof VideoClientError) {
        expect(error.message).toBe('Malformed payload field prompt: Required');
      }
    }
  });
});
