import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { Prober } from './probe/index.js';
import { createAnalysisService, type AnalysisService } from './analysis/index.js';
import { createServer } from './server/index.js';

const config = loadConfig(process.env);

let analysisService: AnalysisService | null = null;
try {
  analysisService = createAnalysisService(config.analysis);
} catch (error) {
  console.error(`[Server] AI analysis disabled: ${error instanceof Error ? error.message : String(error)}`);
}

const app = createServer({
  prober: new Prober(config.probe),
  analysisService,
  dispatcher: {
    timeoutMs: config.analysis.timeoutMs,
    questionTimeoutMs: config.analysis.questionTimeoutMs,
  },
});

app.listen(config.server.port, () => {
  console.log(`URL connectivity doctor running on port ${config.server.port}`);
  console.log(`Analysis: ${analysisService ? `${analysisService.name} (${config.analysis.provider})` : 'rule-based only'}`);
});
