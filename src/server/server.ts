import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import { AnalyzeRequestSchema } from '../schemas/index.js';
import type { TargetProber } from '../probe/index.js';
import { parseTarget } from '../probe/index.js';
import type { AnalysisService } from '../analysis/index.js';
import { AnalysisDispatcher, type DispatcherOptions } from '../dispatcher/index.js';
import { createWorkflow, runDiagnosis } from '../graph/index.js';

export interface ServerConfig {
  prober: TargetProber;
  // null runs every request in fallback-only mode
  analysisService: AnalysisService | null;
  dispatcher: DispatcherOptions;
}

const handleBodyErrors: ErrorRequestHandler = (err, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid request: body must be valid JSON' });
    return;
  }
  next(err);
};

export function createServer(config: ServerConfig): Express {
  const app = express();
  app.use(express.json());
  app.use(handleBodyErrors);

  const dispatcher = new AnalysisDispatcher(config.analysisService, config.dispatcher);
  const workflow = createWorkflow({ prober: config.prober, dispatcher });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      aiEnabled: dispatcher.aiEnabled,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/analyze', async (req: Request, res: Response) => {
    try {
      const parseResult = AnalyzeRequestSchema.safeParse(req.body ?? {});
      if (!parseResult.success) {
        res.status(400).json({ error: 'Invalid request: url is required' });
        return;
      }

      const { url, question, noAi } = parseResult.data;
      const target = parseTarget(url);
      if (!target.ok) {
        res.status(400).json({ error: target.error });
        return;
      }

      console.log(`[Server] Analyzing ${target.target.target}${question ? ` (question: ${question})` : ''}`);

      const result = await runDiagnosis(workflow, { url, question, noAi });
      if (result.error || !result.record || !result.report) {
        res.status(400).json({ error: result.error ?? 'Analysis produced no report' });
        return;
      }

      const { record, report } = result;
      res.json({
        url: record.target,
        question: question ?? null,
        connectivity: record,
        analysis: report.text,
        analysisMetadata: {
          source: report.source,
          model: report.model,
          processingTimeMs: report.processingTimeMs,
          fallbackReason: report.fallbackReason,
        },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error('[Server] Error:', error);
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal server error',
      });
    }
  });

  return app;
}
