import type { BaseMessage } from '@langchain/core/messages';

export type LLMTaskType =
  | 'tutor_response'
  | 'follow_up_questions'
  | 'diagram'
  | 'exam_question'
  | 'explanation'
  | 'ingestion'
  | 'search';

export interface ILLMContext {
  userId?: string;
  sessionId?: string;
  taskType: LLMTaskType;
}

export interface ILLMCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  outputFormat?: 'text' | 'json_object';
}

export interface IChatProvider {
  readonly providerName: string;
  readonly modelName: string;

  /** Runs one chat completion and returns the assistant's text. */
  chat(messages: BaseMessage[], context: ILLMContext, options?: ILLMCompletionOptions): Promise<string>;
}

export interface IEmbeddingProviderCapabilities {
  dimensions: number;
  maxInputTokensPerDocument: number;
}

export interface IEmbeddingProvider {
  readonly providerName: string;
  readonly modelName: string;
  readonly capabilities: IEmbeddingProviderCapabilities;

  embedDocuments(texts: string[], context?: ILLMContext): Promise<number[][]>;

  embedQuery(text: string, context?: ILLMContext): Promise<number[]>;
}
