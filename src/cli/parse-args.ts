export type InfrastructureType = 'architecture' | 'health';
export type DeployAction = 'pre-check' | 'post-check';

interface CommonOptions {
  output?: string;
  noAi: boolean;
  apiUrl?: string;
}

export type CliCommand =
  | ({ command: 'url'; url: string; question?: string } & CommonOptions)
  | ({ command: 'infrastructure'; type: InfrastructureType; cluster: string; service?: string; inventory: string } & CommonOptions)
  | ({ command: 'deploy'; action: DeployAction; cluster: string; service?: string; inventory: string } & CommonOptions)
  | { command: 'help' };

export type ParseResult = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE = `Usage:
  url-doctor url <url> [--question|-q <text>] [--output|-o <file>] [--no-ai]
  url-doctor infrastructure --type architecture --cluster <name> --inventory <file>
  url-doctor infrastructure --type health --cluster <name> [--service <name>] --inventory <file>
  url-doctor deploy --action pre-check|post-check --cluster <name> [--service <name>] --inventory <file>

Global options:
  --api-url <url>   analysis gateway URL (overrides ANALYSIS_API_URL)
  --no-ai           skip the analysis service and use rule-based analysis
  --output, -o      write the report to a file

Examples:
  url-doctor url https://example.com
  url-doctor url https://my-alb.example.com --question "Why is this slow?"
  url-doctor infrastructure --type health --cluster staging --inventory inventory.json
  url-doctor deploy --action pre-check --cluster staging --service web --inventory inventory.json`;

const VALUE_FLAGS: Record<string, string> = {
  '--question': 'question',
  '-q': 'question',
  '--output': 'output',
  '-o': 'output',
  '--api-url': 'apiUrl',
  '--type': 'type',
  '--cluster': 'cluster',
  '--service': 'service',
  '--inventory': 'inventory',
  '--action': 'action',
};

const fail = (error: string): ParseResult => ({ ok: false, error });

export function parseArgs(argv: string[]): ParseResult {
  const positional: string[] = [];
  const values: Record<string, string> = {};
  let noAi = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      return { ok: true, command: { command: 'help' } };
    }
    if (arg === '--no-ai') {
      noAi = true;
      continue;
    }

    if (arg.startsWith('-')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const key = VALUE_FLAGS[flag];
      if (!key) {
        return fail(`Unknown option: ${flag}`);
      }

      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '') {
        return fail(`Missing value for ${flag}`);
      }
      values[key] = value;
      continue;
    }

    positional.push(arg);
  }

  if (positional.length === 0) {
    return { ok: true, command: { command: 'help' } };
  }

  const [command, ...rest] = positional;
  const common: CommonOptions = { output: values.output, noAi, apiUrl: values.apiUrl };

  switch (command) {
    case 'url': {
      if (rest.length !== 1) {
        return fail('The url command takes exactly one URL');
      }
      return { ok: true, command: { command: 'url', url: rest[0], question: values.question, ...common } };
    }

    case 'infrastructure': {
      const { type, cluster, inventory } = values;
      if (type !== 'architecture' && type !== 'health') {
        return fail('--type must be architecture or health');
      }
      if (!cluster || !inventory) {
        return fail('--cluster and --inventory are required');
      }
      if (type === 'architecture' && values.service) {
        return fail('--service only applies to --type health');
      }
      return {
        ok: true,
        command: { command: 'infrastructure', type, cluster, service: values.service, inventory, ...common },
      };
    }

    case 'deploy': {
      const { action, cluster, inventory } = values;
      if (action !== 'pre-check' && action !== 'post-check') {
        return fail('--action must be pre-check or post-check');
      }
      if (!cluster || !inventory) {
        return fail('--cluster and --inventory are required');
      }
      return {
        ok: true,
        command: { command: 'deploy', action, cluster, service: values.service, inventory, ...common },
      };
    }

    default:
      return fail(`Unknown command: ${command}`);
  }
}
