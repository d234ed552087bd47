import { UnsupportedParameterError } from '../errors.js';

export type ReasoningEffort = 'none' | 'low' | 'medium' | 'high';
export type Verbosity = 'low' | 'medium' | 'high';

export const REASONING_EFFORTS: readonly ReasoningEffort[] = ['none', 'low', 'medium', 'high'];
export const VERBOSITIES: readonly Verbosity[] = ['low', 'medium', 'high'];

export interface RequestSpec {
  readonly model: string;
  readonly reasoningEffort: ReasoningEffort;
  readonly verbosity: Verbosity;
  readonly choiceCount: number;
  readonly streaming: boolean;
}

export interface ModelCapabilities {
  /** Context window in tokens. */
  contextSize: number;
  reasoningEfforts: readonly ReasoningEffort[];
  verbosities: readonly Verbosity[];
  /** Whether `n > 1` returns several completions. */
  multipleChoices: boolean;
}

export const MODELS: Record<string, ModelCapabilities> = {
  'gpt-5.1': {
    contextSize: 200_000,
    reasoningEfforts: ['none', 'low', 'medium', 'high'],
    verbosities: ['low', 'medium', 'high'],
    multipleChoices: true,
  },
  'gpt-5.1-codex': {
    contextSize: 200_000,
    reasoningEfforts: ['low', 'medium', 'high'],
    verbosities: ['medium'],
    multipleChoices: false,
  },
  'gpt-5.1-codex-mini': {
    contextSize: 128_000,
    reasoningEfforts: ['medium', 'high'],
    verbosities: ['medium'],
    multipleChoices: false,
  },
};

export const DEFAULT_MODEL = 'gpt-5.1';

export function capabilitiesOf(model: string): ModelCapabilities {
  const capabilities = MODELS[model];
  if (!capabilities) {
    throw new UnsupportedParameterError(
      'model',
      `'${model}' is not supported. Use one of: ${Object.keys(MODELS).join(', ')}`
    );
  }
  return capabilities;
}

/**
 * Local pre-flight check of a request against what the model accepts.
 * Throws UnsupportedParameterError naming the first offending parameter.
 */
export function validateRequestSpec(spec: RequestSpec): ModelCapabilities {
  const capabilities = capabilitiesOf(spec.model);

  if (!capabilities.reasoningEfforts.includes(spec.reasoningEffort)) {
    throw new UnsupportedParameterError(
      'reasoning_effort',
      `${spec.model} accepts ${capabilities.reasoningEfforts.join(', ')}, got '${spec.reasoningEffort}'`
    );
  }

  if (!capabilities.verbosities.includes(spec.verbosity)) {
    throw new UnsupportedParameterError(
      'verbosity',
      `${spec.model} accepts ${capabilities.verbosities.join(', ')}, got '${spec.verbosity}'`
    );
  }

  if (!Number.isInteger(spec.choiceCount) || spec.choiceCount < 1) {
    throw new UnsupportedParameterError('n', `choice count must be a positive integer, got ${spec.choiceCount}`);
  }

  if (spec.choiceCount > 1 && !capabilities.multipleChoices) {
    throw new UnsupportedParameterError('n', `${spec.model} returns a single completion, got ${spec.choiceCount}`);
  }

  return capabilities;
}
