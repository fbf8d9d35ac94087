import OpenAI, { AzureOpenAI } from "openai";
import type { EasyInputMessage } from "openai/resources/responses/responses";
import type { AppEnv } from "../env";
import { GenerationUnavailableError } from "../orchestrator/errors";
import type { GenerateOptions, GenerationGateway } from "../orchestrator/gateway";
import type { ConversationTurn } from "../orchestrator/types";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.5;
const DEFAULT_MAX_OUTPUT_TOKENS = 9000;
const REQUEST_TIMEOUT_MS = 60_000;

type ResponseInput = string | EasyInputMessage[];

type SharedSettings = {
  apiKey: string;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;
};

export type OpenAIGatewayConfig =
  | (SharedSettings & { provider: "openai"; model?: string; baseURL?: string })
  | (SharedSettings & { provider: "azure"; endpoint: string; apiVersion: string; deployment: string });

function field(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

function describeFailure(error: unknown): string {
  if (typeof error !== "object" || error === null) {
    return String(error);
  }
  const status = field(error, "status");
  const code = field(error, "code");
  const name = field(error, "name");
  if (name === "APIConnectionTimeoutError" || status === 408 || code === "ETIMEDOUT") {
    return "request timed out";
  }
  if (name === "APIUserAbortError" || name === "AbortError") {
    return "request aborted";
  }
  if (status === 401 || status === 403) {
    return `authentication rejected (status ${status})`;
  }
  if (status === 429) {
    return "rate limited (status 429)";
  }
  if (typeof status === "number") {
    return `provider error (status ${status})`;
  }
  return error instanceof Error ? error.message : "unknown failure";
}

function toMessages(systemPayload: string, turns: readonly ConversationTurn[]): EasyInputMessage[] {
  return [
    { role: "system", content: systemPayload, type: "message" },
    ...turns.map((turn): EasyInputMessage => ({ role: turn.role, content: turn.text, type: "message" }))
  ];
}

export class OpenAIGenerationGateway implements GenerationGateway {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number | undefined;

  constructor(config: OpenAIGatewayConfig) {
    if (config.provider === "azure") {
      this.client = new AzureOpenAI({
        apiKey: config.apiKey,
        endpoint: config.endpoint,
        apiVersion: config.apiVersion,
        deployment: config.deployment
      });
      this.model = config.deployment;
    } else {
      this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
      this.model = config.model ?? DEFAULT_MODEL;
    }
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxOutputTokens = config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.timeoutMs = config.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxRetries = config.maxRetries;
  }

  async generateFromPrompt(payload: string, options?: GenerateOptions): Promise<string> {
    return this.callResponsesApi(payload, options);
  }

  async generateFromHistory(
    systemPayload: string,
    turns: readonly ConversationTurn[],
    options?: GenerateOptions
  ): Promise<string> {
    return this.callResponsesApi(toMessages(systemPayload, turns), options);
  }

  private async callResponsesApi(input: ResponseInput, options?: GenerateOptions): Promise<string> {
    let text: string;
    try {
      const response = await this.client.responses.create(
        {
          model: this.model,
          temperature: this.temperature,
          max_output_tokens: this.maxOutputTokens,
          input,
          stream: false
        },
        {
          signal: options?.signal,
          timeout: this.timeoutMs,
          maxRetries: this.maxRetries
        }
      );
      text = response.output_text ?? "";
    } catch (error) {
      throw new GenerationUnavailableError(`OpenAI ${describeFailure(error)}`, { cause: error });
    }

    if (!text.trim()) {
      throw new GenerationUnavailableError("OpenAI returned no text output");
    }
    return text;
  }
}

export function createGatewayFromEnv(env: AppEnv): OpenAIGenerationGateway {
  const shared = {
    temperature: env.GENERATION_TEMPERATURE,
    maxOutputTokens: env.GENERATION_MAX_OUTPUT_TOKENS,
    timeoutMs: env.GENERATION_TIMEOUT_MS,
    maxRetries: env.GENERATION_MAX_RETRIES
  };

  if (env.AZURE_OPENAI_ENDPOINT) {
    const apiKey = env.AZURE_OPENAI_API_KEY;
    const deployment = env.AZURE_OPENAI_DEPLOYMENT_NAME;
    if (!apiKey || !deployment) {
      throw new Error("AZURE_OPENAI_API_KEY and AZURE_OPENAI_DEPLOYMENT_NAME are required with AZURE_OPENAI_ENDPOINT.");
    }
    return new OpenAIGenerationGateway({
      provider: "azure",
      apiKey,
      endpoint: env.AZURE_OPENAI_ENDPOINT,
      apiVersion: env.AZURE_OPENAI_API_VERSION ?? "2025-03-01-preview",
      deployment,
      ...shared
    });
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is required to call OpenAI APIs.");
  }
  return new OpenAIGenerationGateway({
    provider: "openai",
    apiKey,
    baseURL: env.OPENAI_API_BASE,
    model: env.OPENAI_MODEL,
    ...shared
  });
}
