export interface AnalysisRequest {
  prompt: string;
  // label telling the backend what kind of analysis this is, e.g. "url-analysis"
  context: string;
  timeoutMs: number;
}

export interface AnalysisResponse {
  text: string;
  model?: string;
  processingTimeMs: number;
}

export interface AnalysisService {
  readonly name: string;
  analyze(request: AnalysisRequest): Promise<AnalysisResponse>;
}

export type AnalysisErrorKind = 'timeout' | 'status' | 'connection' | 'api_error' | 'invalid_response';

export class AnalysisServiceError extends Error {
  readonly status?: number;

  constructor(
    public readonly kind: AnalysisErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AnalysisServiceError';
    this.status = options?.status;
  }
}
