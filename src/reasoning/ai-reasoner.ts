/**
 * AiReasoner
 *
 * Asks an OpenAI-compatible chat model for a decision shaped like
 * ReasoningDecisionSchema. Retrying is the worker's job, so the SDK's own
 * retries are off and retry-worthy failures surface as
 * TransientCollaboratorError.
 */

import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { APICallError, NoObjectGeneratedError, generateObject, type LanguageModel } from 'ai';
import type { ReasoningConfig } from '../config/types';
import { TransientCollaboratorError } from '../errors';
import { createModuleLogger } from '../utils/logger';
import { MODE_STYLES, ROLE_PROFILES } from '../roles/profiles';
import {
  ReasoningDecisionSchema,
  type ReasonOptions,
  type Reasoner,
  type ReasoningDecision,
  type ReasoningRequest,
} from './types';

const log = createModuleLogger('ai-reasoner');

export interface AiReasonerConfig {
  model: LanguageModel;
  temperature?: number;
}

export class AiReasoner implements Reasoner {
  readonly name = 'openai-compatible';

  constructor(private readonly config: AiReasonerConfig) {}

  async decide(request: ReasoningRequest, options: ReasonOptions = {}): Promise<ReasoningDecision> {
    log.debug({ role: request.role, attempt: request.attempt }, 'Requesting decision');
    try {
      const { object } = await generateObject({
        model: this.config.model,
        schema: ReasoningDecisionSchema,
        mode: 'json',
        system: buildSystemPrompt(request),
        prompt: buildPrompt(request),
        temperature: this.config.temperature,
        abortSignal: options.signal,
        maxRetries: 0,
      });
      return object;
    } catch (error) {
      throw classifyFailure(error, options.signal);
    }
  }
}

/**
 * Builds the model from reasoning config; the API key comes from the
 * environment variable the config names.
 */
export function createAiReasoner(config: ReasoningConfig): AiReasoner {
  const provider = createOpenAICompatible({
    name: 'cop-reasoning',
    baseURL: config.baseURL,
    apiKey: process.env[config.apiKeyEnv],
  });
  return new AiReasoner({ model: provider(config.model), temperature: config.temperature });
}

export function classifyFailure(error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
    return new TransientCollaboratorError('Reasoning call aborted', { cause: error });
  }
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (error.isRetryable || (status !== undefined && status >= 500)) {
      return new TransientCollaboratorError(
        `Reasoning endpoint failed${status !== undefined ? ` (${status})` : ''}: ${error.message}`,
        { cause: error }
      );
    }
    return error;
  }
  // Models occasionally emit unparseable output; another sample may not
  if (NoObjectGeneratedError.isInstance(error)) {
    return new TransientCollaboratorError('Reasoning response did not match the decision schema', {
      cause: error,
    });
  }
  return error;
}

function buildSystemPrompt(request: ReasoningRequest): string {
  const profile = ROLE_PROFILES[request.role];
  return [
    `You are the ${profile.title} (${profile.role}) in an observe-orient-decide-act team maintaining a common operating picture.`,
    profile.responsibilities,
    'Respond with a JSON object: {"mutations": [...], "messages": [...], "rationale": "..."}.',
    `Only propose mutations your role may perform; announce results on ${profile.publishes.map((topic) => `"${topic}"`).join(' or ')}.`,
    MODE_STYLES[request.mode],
  ].join('\n');
}

function buildPrompt(request: ReasoningRequest): string {
  const stimulus =
    request.stimulus.kind === 'trigger'
      ? { trigger: request.stimulus.trigger }
      : {
          message: {
            topic: request.stimulus.message.topic,
            sender: request.stimulus.message.sender,
            payload: request.stimulus.message.payload,
          },
        };
  const { scope, ...tables } = request.excerpt;
  const visible = Object.fromEntries(
    Object.entries(tables).filter(([table]) => scope.some((name) => name === table))
  );
  return JSON.stringify({ stimulus, picture: visible, attempt: request.attempt }, null, 2);
}
