import { describe, it, expect } from 'vitest';
import { capabilitiesOf, validateRequestSpec, type RequestSpec } from '../../src/engines/models.js';
import { UnsupportedParameterError } from '../../src/errors.js';

const spec = (overrides: Partial<RequestSpec> = {}): RequestSpec => ({
  model: 'gpt-5.1',
  reasoningEffort: 'low',
  verbosity: 'medium',
  choiceCount: 3,
  streaming: true,
  ...overrides,
});

function rejectedParam(request: RequestSpec): string | undefined {
  try {
    validateRequestSpec(request);
    return undefined;
  } catch (error) {
    if (error instanceof UnsupportedParameterError) return error.param;
    throw error;
  }
}

describe('capabilitiesOf', () => {
  it('should know the context size of each model', () => {
    expect(capabilitiesOf('gpt-5.1').contextSize).toBe(200_000);
    expect(capabilitiesOf('gpt-5.1-codex').contextSize).toBe(200_000);
    expect(capabilitiesOf('gpt-5.1-codex-mini').contextSize).toBe(128_000);
  });

  it('should reject an unknown model', () => {
    expect(() => capabilitiesOf('gpt-2')).toThrow(UnsupportedParameterError);
  });
});

describe('validateRequestSpec', () => {
  it('should accept several choices on the general model', () => {
    expect(validateRequestSpec(spec())).toBe(capabilitiesOf('gpt-5.1'));
  });

  it('should name the parameter a model does not accept', () => {
    expect(rejectedParam(spec({ model: 'gpt-2' }))).toBe('model');
    expect(rejectedParam(spec({ model: 'gpt-5.1-codex', reasoningEffort: 'none', choiceCount: 1 }))).toBe(
      'reasoning_effort'
    );
    expect(rejectedParam(spec({ model: 'gpt-5.1-codex-mini', reasoningEffort: 'low', choiceCount: 1 }))).toBe(
      'reasoning_effort'
    );
    expect(rejectedParam(spec({ model: 'gpt-5.1-codex', verbosity: 'low', choiceCount: 1 }))).toBe('verbosity');
    expect(rejectedParam(spec({ model: 'gpt-5.1-codex', choiceCount: 2 }))).toBe('n');
    expect(rejectedParam(spec({ choiceCount: 0 }))).toBe('n');
  });

  it('should accept a single choice on a single-completion model', () => {
    expect(rejectedParam(spec({ model: 'gpt-5.1-codex-mini', reasoningEffort: 'high', choiceCount: 1 }))).toBeUndefined();
  });
});
