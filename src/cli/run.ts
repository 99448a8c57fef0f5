import type { AnalysisConfig, AppConfig, ProbeConfig } from '../config/index.js';
import { ConfigError } from '../config/index.js';
import type { AnalysisReport, DiagnosticRecord, InfrastructureSubject } from '../schemas/index.js';
import type { TargetProber } from '../probe/index.js';
import { buildSummary, type AnalysisService, type AnalysisServiceOptions } from '../analysis/index.js';
import { AnalysisDispatcher } from '../dispatcher/index.js';
import { createWorkflow, runDiagnosis } from '../graph/index.js';
import {
  InventoryError,
  postDeploymentCheck,
  preDeploymentCheck,
  selectServices,
  type InventorySource,
} from '../inventory/index.js';
import { parseArgs, USAGE, type CliCommand } from './parse-args.js';

export interface CliDeps {
  loadConfig(): AppConfig;
  createProber(config: ProbeConfig): TargetProber;
  createAnalysisService(config: AnalysisConfig, options: AnalysisServiceOptions): AnalysisService;
  createInventorySource(path: string): InventorySource;
  writeReport(path: string, content: string): void;
  now(): Date;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

type RunnableCommand = Exclude<CliCommand, { command: 'help' }>;

function banner(title: string): void {
  console.log('='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
}

function createDispatcher(command: RunnableCommand, config: AppConfig, deps: CliDeps): AnalysisDispatcher {
  const options = {
    timeoutMs: config.analysis.timeoutMs,
    questionTimeoutMs: config.analysis.questionTimeoutMs,
  };
  if (command.noAi) {
    return new AnalysisDispatcher(null, options);
  }

  try {
    return new AnalysisDispatcher(deps.createAnalysisService(config.analysis, { apiUrl: command.apiUrl }), options);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.log(`[CLI] AI analysis unavailable: ${error.message}`);
    return new AnalysisDispatcher(null, options);
  }
}

function printReport(report: AnalysisReport, output: string | undefined, deps: CliDeps): void {
  const source = report.source === 'ai' ? `AI${report.model ? `: ${report.model}` : ''}` : 'rule-based';
  console.log(`\nAnalysis (${source})`);
  console.log('-'.repeat(60));
  console.log(report.text);

  if (output) {
    deps.writeReport(output, report.text);
    console.log(`\nReport saved to: ${output}`);
  }
}

function printConnectivity(record: DiagnosticRecord): void {
  console.log('\nConnectivity');
  for (const line of buildSummary(record)) {
    console.log(`  ${line}`);
  }
}

async function runUrl(
  command: Extract<CliCommand, { command: 'url' }>,
  config: AppConfig,
  deps: CliDeps,
): Promise<number> {
  banner('URL Connectivity Analysis');
  console.log(`Target: ${command.url}`);
  if (command.question) {
    console.log(`Question: ${command.question}`);
  }

  const workflow = createWorkflow({
    prober: deps.createProber(config.probe),
    dispatcher: createDispatcher(command, config, deps),
  });
  const result = await runDiagnosis(workflow, { url: command.url, question: command.question, noAi: command.noAi });

  if (result.error || !result.record || !result.report) {
    console.error(`\n❌ ${result.error ?? 'Analysis produced no report'}`);
    return EXIT_FAILURE;
  }

  printConnectivity(result.record);
  printReport(result.report, command.output, deps);
  return result.record.errors.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function runInfrastructure(
  command: Extract<CliCommand, { command: 'infrastructure' }>,
  config: AppConfig,
  deps: CliDeps,
): Promise<number> {
  banner(`Infrastructure Analysis (${command.type})`);
  console.log(`Cluster: ${command.cluster}`);

  const snapshot = await deps.createInventorySource(command.inventory).describeCluster(command.cluster);
  const observedAt = deps.now().toISOString();
  const subject: InfrastructureSubject =
    command.type === 'architecture'
      ? { kind: 'architecture', observedAt, snapshot }
      : { kind: 'health', observedAt, clusterName: snapshot.clusterName, services: selectServices(snapshot, command.service) };

  const report = await createDispatcher(command, config, deps).analyzeInfrastructure(subject);
  printReport(report, command.output, deps);
  return EXIT_OK;
}

async function runDeploy(
  command: Extract<CliCommand, { command: 'deploy' }>,
  config: AppConfig,
  deps: CliDeps,
): Promise<number> {
  banner(`Deployment Check (${command.action})`);
  console.log(`Cluster: ${command.cluster}`);

  const snapshot = await deps.createInventorySource(command.inventory).describeCluster(command.cluster);
  const check =
    command.action === 'pre-check'
      ? preDeploymentCheck(snapshot, command.service)
      : postDeploymentCheck(snapshot, command.service);

  console.log(`Status: ${check.status}`);
  console.log(`Recommendation: ${check.recommendation}`);

  const report = await createDispatcher(command, config, deps).analyzeInfrastructure({
    kind: 'deployment',
    observedAt: deps.now().toISOString(),
    check,
  });
  printReport(report, command.output, deps);

  return check.status === 'ready' || check.status === 'success' ? EXIT_OK : EXIT_FAILURE;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`❌ ${parsed.error}\n`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  const { command } = parsed;
  if (command.command === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  try {
    const config = deps.loadConfig();
    switch (command.command) {
      case 'url':
        return await runUrl(command, config, deps);
      case 'infrastructure':
        return await runInfrastructure(command, config, deps);
      case 'deploy':
        return await runDeploy(command, config, deps);
    }
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InventoryError) {
      console.error(`❌ ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
