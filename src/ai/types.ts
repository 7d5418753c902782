export interface LlmProviderConfig {
  name: string;
  /** OpenAI-compatible chat completions endpoint. */
  endpoint: string;
  model: string;
  apiKey: string;
}

export interface ChatCompletion {
  content: string;
  promptTokens: number;
  completionTokens: number;
}

export interface ChatOptions {
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
}

/** JSON the classifier prompt asks the model for. */
export interface RelevanceVerdict {
  isRelevant: boolean;
  relevanceScore: number;
  reasoning: string;
  matchedSkills: string[];
}
