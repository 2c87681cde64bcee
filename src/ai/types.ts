export interface AIProviderConfig {
  name: string;
  endpoint: string;
  model: string;
  apiKey: string;
}

export interface CallSettings {
  maxRetries: number;
  backoffStartMs: number;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface Completion {
  content: string;
  promptTokens: number;
  completionTokens: number;
}
