import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import type { DebugLogger } from '../debug-log.js';
import {
  AuthenticationError,
  IncompleteStreamError,
  InvalidRequestError,
  MalformedResponseError,
  ModelRequestError,
  NetworkError,
  RateLimitedError,
  RequestCancelledError,
} from '../errors.js';
import { validateRequestSpec, type RequestSpec } from './models.js';
import {
  buildMessages,
  buildRevisionMessages,
  parseCandidate,
  type ChatMessage,
  type CommitMessageCandidate,
  type PromptContext,
} from './prompt.js';
import { readEventData } from './stream.js';

export const DEFAULT_API_ENDPOINT = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RATE_LIMIT_BACKOFF_MS = 2_000;

const STREAM_DONE = '[DONE]';

const ApiErrorSchema = z.object({
  message: z.string(),
  type: z.string().nullish(),
  param: z.string().nullish(),
  code: z.string().nullish(),
});

const ErrorBodySchema = z.object({ error: ApiErrorSchema });

const CompletionSchema = z.object({
  choices: z.array(
    z.object({
      index: z.number().int().nonnegative().optional(),
      message: z.object({ content: z.string().nullish() }),
    })
  ),
});

const ChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        delta: z.object({ content: z.string().nullish() }).nullish(),
      })
    )
    .default([]),
  error: ApiErrorSchema.optional(),
});

export interface StreamFragment {
  index: number;
  text: string;
}

export interface CallOptions {
  signal?: AbortSignal;
  /** Receives streamed text in arrival order. */
  onFragment?: (fragment: StreamFragment) => void;
}

export interface MessageClientOptions {
  apiKey: string;
  endpoint?: string;
  systemPrompt: string;
  currentDescription?: string;
  extraInstruction?: string;
  /** How long to wait for response headers before counting the attempt as failed. */
  timeoutMs?: number;
  rateLimitBackoffMs?: number;
  fetch?: typeof fetch;
  debug?: DebugLogger;
  /** Sees every message list before it is sent. */
  onRequest?: (messages: readonly ChatMessage[]) => void;
}

type Fetch = typeof fetch;

/**
 * Chat-completion client for commit message drafts. One request yields
 * `choiceCount` candidates; network failures and a first 429 are retried once.
 */
export class MessageClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly fetchImpl: Fetch;

  constructor(private readonly options: MessageClientOptions) {
    this.endpoint = options.endpoint ?? DEFAULT_API_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? DEFAULT_RATE_LIMIT_BACKOFF_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async generate(diff: string, spec: RequestSpec, call: CallOptions = {}): Promise<CommitMessageCandidate[]> {
    validateRequestSpec(spec);
    return this.complete(buildMessages(this.context(diff)), spec, call);
  }

  async revise(
    diff: string,
    prior: CommitMessageCandidate,
    instruction: string,
    spec: RequestSpec,
    call: CallOptions = {}
  ): Promise<CommitMessageCandidate[]> {
    const single: RequestSpec = { ...spec, choiceCount: 1 };
    validateRequestSpec(single);
    return this.complete(buildRevisionMessages(this.context(diff), prior, instruction), single, call);
  }

  private context(diff: string): PromptContext {
    return {
      systemPrompt: this.options.systemPrompt,
      currentDescription: this.options.currentDescription,
      extraInstruction: this.options.extraInstruction,
      diff,
    };
  }

  private async complete(
    messages: ChatMessage[],
    spec: RequestSpec,
    call: CallOptions
  ): Promise<CommitMessageCandidate[]> {
    const body = JSON.stringify({
      model: spec.model,
      messages,
      n: spec.choiceCount,
      stream: spec.streaming,
      reasoning_effort: spec.reasoningEffort,
      verbosity: spec.verbosity,
    });
    this.options.onRequest?.(messages);
    this.options.debug?.request(body);
    this.options.debug?.info(
      `model=${spec.model}, effort=${spec.reasoningEffort}, verbosity=${spec.verbosity}, n=${spec.choiceCount}, messages=${messages.length}`
    );

    const texts = await this.send(body, call.signal, (response) =>
      spec.streaming
        ? this.readStream(response, spec.choiceCount, call)
        : this.readCompletion(response, spec.choiceCount)
    );

    this.options.debug?.response(JSON.stringify(texts));
    return toCandidates(texts);
  }

  /**
   * Posts `body` and hands a successful response to `read`. A failure to
   * connect or to download the body counts as a network failure.
   */
  private async send<T>(
    body: string,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    let networkRetried = false;
    let rateLimitRetried = false;

    for (;;) {
      if (signal?.aborted) throw new RequestCancelledError();

      // Own controller per attempt so a header timeout and the caller's signal
      // both close the connection; the caller's signal stays attached until the
      // body has been read.
      const controller = new AbortController();
      const forward = () => controller.abort(signal?.reason);
      signal?.addEventListener('abort', forward, { once: true });

      try {
        let response: Response;
        try {
          response = await this.post(body, controller);
          if (response.ok) return await read(response);
        } catch (error) {
          if (signal?.aborted) throw new RequestCancelledError();
          if (error instanceof ModelRequestError) throw error;
          if (!networkRetried) {
            networkRetried = true;
            this.options.debug?.error(`network failure, retrying: ${describe(error)}`);
            continue;
          }
          throw new NetworkError(this.endpoint, { cause: error });
        }

        const detail = await readErrorDetail(response);
        this.options.debug?.error(`HTTP ${response.status}: ${detail.message}`);

        switch (response.status) {
          case 401:
            throw new AuthenticationError(detail.message);
          case 400:
            throw new InvalidRequestError(detail.message, detail.param ?? undefined);
          case 429:
            if (!rateLimitRetried) {
              rateLimitRetried = true;
              await this.backoff(signal);
              continue;
            }
            throw new RateLimitedError(detail.message);
          default:
            throw new ModelRequestError(`HTTP ${response.status}: ${detail.message}`, response.status);
        }
      } finally {
        signal?.removeEventListener('abort', forward);
      }
    }
  }

  private async post(body: string, controller: AbortController): Promise<Response> {
    const timer = setTimeout(
      () => controller.abort(new Error(`no response within ${this.timeoutMs} ms`)),
      this.timeoutMs
    );

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    try {
      return await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  private async backoff(signal?: AbortSignal): Promise<void> {
    try {
      await sleep(this.rateLimitBackoffMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) throw new RequestCancelledError();
      throw error;
    }
  }

  private async readCompletion(response: Response, n: number): Promise<string[]> {
    const parsed = CompletionSchema.safeParse(parseJson(await response.text()));
    if (!parsed.success) {
      throw new MalformedResponseError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const texts = Array.from({ length: n }, () => '');
    parsed.data.choices.forEach((choice, position) => {
      const index = choice.index ?? position;
      if (index < n) texts[index] = choice.message.content ?? '';
    });
    return texts;
  }

  private async readStream(response: Response, n: number, call: CallOptions): Promise<string[]> {
    if (!response.body) {
      throw new IncompleteStreamError('response has no body');
    }

    const texts = Array.from({ length: n }, () => '');
    let done = false;

    try {
      for await (const data of readEventData(response.body)) {
        if (data === STREAM_DONE) {
          done = true;
          break;
        }

        const chunk = ChunkSchema.safeParse(parseJson(data));
        if (!chunk.success) {
          this.options.debug?.error(`skipping unparsable stream fragment: ${data}`);
          continue;
        }
        if (chunk.data.error) {
          throw new ModelRequestError(`stream error: ${chunk.data.error.message}`);
        }

        for (const choice of chunk.data.choices) {
          const text = choice.delta?.content;
          if (!text || choice.index >= n) continue;
          texts[choice.index] += text;
          call.onFragment?.({ index: choice.index, text });
        }
      }
    } catch (error) {
      if (call.signal?.aborted) throw new RequestCancelledError();
      if (error instanceof ModelRequestError) throw error;
      throw new IncompleteStreamError(describe(error), { cause: error });
    }

    if (!done) {
      if (call.signal?.aborted) throw new RequestCancelledError();
      throw new IncompleteStreamError(`connection closed before ${STREAM_DONE}`);
    }
    return texts;
  }
}

function toCandidates(texts: string[]): CommitMessageCandidate[] {
  return texts.map((text, index) => {
    const candidate = parseCandidate(text, index);
    if (!candidate) {
      throw new MalformedResponseError(`choice ${index} has no commit subject`);
    }
    return candidate;
  });
}

async function readErrorDetail(response: Response): Promise<{ message: string; param?: string | null }> {
  const text = await response.text().catch(() => '');
  const parsed = ErrorBodySchema.safeParse(parseJson(text));
  if (parsed.success) {
    return { message: parsed.data.error.message, param: parsed.data.error.param };
  }
  return { message: text.trim() || response.statusText || 'no details' };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}
