#!/usr/bin/env node
import 'dotenv/config';
import { writeFileSync } from 'fs';
import { runCli } from './cli/index.js';
import { loadConfig } from './config/index.js';
import { Prober } from './probe/index.js';
import { createAnalysisService } from './analysis/index.js';
import { FileInventorySource } from './inventory/index.js';

async function main() {
  const exitCode = await runCli(process.argv.slice(2), {
    loadConfig: () => loadConfig(process.env),
    createProber: (config) => new Prober(config),
    createAnalysisService,
    createInventorySource: (path) => new FileInventorySource(path),
    writeReport: (path, content) => writeFileSync(path, content),
    now: () => new Date(),
  });
  process.exitCode = exitCode;
}

main().catch((error) => {
  console.error('❌ Unexpected error:', error);
  process.exitCode = 1;
});
