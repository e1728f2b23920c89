import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json_object';
  apiKey?: string;
}

/**
 * Minimal helper for creating ChatOpenAI instances with API key management
 */
export function createChatModel(modelName: string, options: ChatModelOptions = {}): ChatOpenAI {
  return new ChatOpenAI({
    model: modelName,
    apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    modelKwargs: options.responseFormat === 'json_object'
      ? { response_format: { type: 'json_object' } }
      : undefined,
  });
}

/**
 * Minimal helper for creating OpenAIEmbeddings instances with API key management
 */
export function createEmbeddingModel(modelName: string = 'text-embedding-3-small', apiKey?: string): OpenAIEmbeddings {
  return new OpenAIEmbeddings({
    model: modelName,
    apiKey: apiKey ?? process.env.OPENAI_API_KEY,
  });
}
