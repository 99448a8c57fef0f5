import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage, type MessageContent } from '@langchain/core/messages';
import { classifyConnectionError } from '../probe/classify-error.js';
import { AnalysisServiceError, type AnalysisRequest, type AnalysisResponse, type AnalysisService } from './analysis-service.js';

const SYSTEM_PROMPTS: Record<string, string> = {
  'url-analysis': 'You are a site reliability engineer diagnosing URL connectivity problems. Answer in Markdown.',
  'architecture-analysis': 'You are a cloud architect reviewing a container cluster. Answer in Markdown.',
  'health-analysis': 'You are an on-call engineer assessing service health. Answer in Markdown.',
  'deployment-analysis': 'You are a release engineer assessing a deployment. Answer in Markdown.',
};

const DEFAULT_SYSTEM_PROMPT = 'You are a DevOps assistant. Answer in Markdown.';

export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * Analysis backed by a LangChain chat model (OpenAI-compatible router, OpenAI, Anthropic or Google).
 */
export class ChatModelAnalysisService implements AnalysisService {
  readonly name: string;

  constructor(
    private llm: BaseChatModel,
    private model: string,
    provider: string,
  ) {
    this.name = provider;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    const startedAt = Date.now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new AnalysisServiceError('timeout', `LLM call timed out after ${request.timeoutMs / 1000}s`));
        controller.abort();
      }, request.timeoutMs);
    });

    console.log(`[LLM] Calling ${this.model} (timeout: ${request.timeoutMs / 1000}s)`);

    try {
      const response = await Promise.race([
        this.llm.invoke(
          [new SystemMessage(SYSTEM_PROMPTS[request.context] ?? DEFAULT_SYSTEM_PROMPT), new HumanMessage(request.prompt)],
          { signal: controller.signal },
        ),
        timeoutPromise,
      ]);

      const text = contentToText(response.content).trim();
      if (!text) {
        throw new AnalysisServiceError('invalid_response', 'No analysis response available');
      }

      return { text, model: this.model, processingTimeMs: Date.now() - startedAt };
    } catch (error) {
      if (error instanceof AnalysisServiceError) throw error;

      const info = classifyConnectionError(error);
      if (info.isConnectionError) {
        const kind = info.errorType === 'timeout' ? 'timeout' : 'connection';
        throw new AnalysisServiceError(kind, `LLM connection failed: ${info.reason}`, { cause: error });
      }
      throw new AnalysisServiceError('api_error', `LLM API error: ${info.reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
