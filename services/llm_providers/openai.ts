import type { BaseMessage } from '@langchain/core/messages';
import type { OpenAIEmbeddings } from '@langchain/openai';
import type {
  IChatProvider,
  IEmbeddingProvider,
  IEmbeddingProviderCapabilities,
  ILLMCompletionOptions,
  ILLMContext,
} from '../../shared/llm-types';
import { createChatModel, createEmbeddingModel } from '../../utils/llm';
import { logger } from '../../utils/logger';

const DEFAULT_TEMPERATURE = 0.7;

const EMBEDDING_CAPABILITIES: Record<string, IEmbeddingProviderCapabilities> = {
  'text-embedding-3-small': { dimensions: 1536, maxInputTokensPerDocument: 8191 },
  'text-embedding-3-large': { dimensions: 3072, maxInputTokensPerDocument: 8191 },
  'text-embedding-ada-002': { dimensions: 1536, maxInputTokensPerDocument: 8191 },
};

/**
 * Chat completions through ChatOpenAI. A model is created per call so that
 * temperature and token limits can differ between requests.
 */
export class OpenAIChatProvider implements IChatProvider {
  readonly providerName: string;

  constructor(readonly modelName: string, private readonly apiKey?: string) {
    this.providerName = `OpenAI-${modelName}`;
    logger.info(`[OpenAIChatProvider] Initialized ${modelName}`);
  }

  async chat(messages: BaseMessage[], context: ILLMContext, options?: ILLMCompletionOptions): Promise<string> {
    logger.debug(`[${this.providerName}] chat called`, {
      context,
      messageCount: messages.length,
      options,
    });

    try {
      const model = createChatModel(this.modelName, {
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: options?.maxTokens,
        responseFormat: options?.outputFormat,
        apiKey: this.apiKey,
      });
      const response = await model.invoke(messages);
      return typeof response.content === 'string' ? response.content : JSON.stringify(response.content);
    } catch (error) {
      logger.error(`[${this.providerName}] chat error:`, error);
      throw error;
    }
  }
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private readonly embeddings: OpenAIEmbeddings;

  readonly providerName: string;
  readonly capabilities: IEmbeddingProviderCapabilities;

  constructor(readonly modelName: string = 'text-embedding-3-small', apiKey?: string) {
    this.embeddings = createEmbeddingModel(modelName, apiKey);
    this.providerName = `OpenAI-${modelName}`;
    this.capabilities = EMBEDDING_CAPABILITIES[modelName] ?? { dimensions: 1536, maxInputTokensPerDocument: 8191 };
    logger.info(`[OpenAIEmbeddingProvider] Initialized ${modelName}`);
  }

  async embedDocuments(texts: string[], context?: ILLMContext): Promise<number[][]> {
    logger.debug(`[${this.providerName}] embedDocuments called`, {
      textCount: texts.length,
      context,
    });

    try {
      return await this.embeddings.embedDocuments(texts);
    } catch (error) {
      logger.error(`[${this.providerName}] embedDocuments error:`, error);
      throw error;
    }
  }

  async embedQuery(text: string, context?: ILLMContext): Promise<number[]> {
    logger.debug(`[${this.providerName}] embedQuery called`, {
      textLength: text.length,
      context,
    });

    try {
      return await this.embeddings.embedQuery(text);
    } catch (error) {
      logger.error(`[${this.providerName}] embedQuery error:`, error);
      throw error;
    }
  }
}
