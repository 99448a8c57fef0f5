import { GatewayResponseSchema, type GatewayRequest } from '../schemas/index.js';
import { classifyConnectionError } from '../probe/classify-error.js';
import { AnalysisServiceError, type AnalysisRequest, type AnalysisResponse, type AnalysisService } from './analysis-service.js';

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = GatewayResponseSchema.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.error) {
      return parsed.data.error;
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
  }
  return text.slice(0, 200);
}

/**
 * Client for the analysis gateway: POST {apiUrl}/api/analyze with { prompt, context }.
 */
export class GatewayAnalysisService implements AnalysisService {
  readonly name = 'gateway';

  constructor(private apiUrl: string) {}

  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);
    const startedAt = Date.now();
    const body: GatewayRequest = { prompt: request.prompt, context: request.context };

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/api/analyze`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      const info = classifyConnectionError(error);
      if (info.errorType === 'timeout') {
        throw new AnalysisServiceError('timeout', `Analysis API timeout after ${request.timeoutMs}ms`, { cause: error });
      }
      throw new AnalysisServiceError('connection', `Analysis API connection failed: ${info.reason}`, { cause: error });
    }

    try {
      if (!response.ok) {
        const detail = await readErrorDetail(response);
        throw new AnalysisServiceError('status', `Analysis API returned status ${response.status}: ${detail}`, {
          status: response.status,
        });
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw new AnalysisServiceError('timeout', `Analysis API timeout after ${request.timeoutMs}ms`, { cause: error });
        }
        throw new AnalysisServiceError('invalid_response', 'Analysis API returned a non-JSON body', { cause: error });
      }

      const parsed = GatewayResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new AnalysisServiceError('invalid_response', `Analysis API returned an unexpected body: ${parsed.error.message}`);
      }
      if (parsed.data.error) {
        throw new AnalysisServiceError('api_error', `Analysis API error: ${parsed.data.error}`);
      }
      if (!parsed.data.response) {
        throw new AnalysisServiceError('invalid_response', 'No analysis response available');
      }

      return {
        text: parsed.data.response,
        model: parsed.data.model,
        processingTimeMs: parsed.data.processing_time_ms ?? Date.now() - startedAt,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
