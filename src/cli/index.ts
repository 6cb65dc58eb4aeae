#!/usr/bin/env node
/**
 * coldstart-bench CLI
 *
 * Deploys services under test, measures cold starts and warm latency, and
 * publishes reports.
 */
import { config as loadDotenv } from 'dotenv';
import { CancelledError, ConfigError } from '../errors.js';

const commands = [
  'deploy',
  'run',
  'adhoc',
  'measure',
  'finalize',
  'cleanup',
  'report',
  'compare',
  'help'
] as const;

type Command = (typeof commands)[number];

function isCommand(value: string): value is Command {
  return commands.some((command) => command === value);
}

function printHelp() {
  console.log(`
Cold start benchmark

Usage: coldstart-bench <command> [options]

Commands:
  deploy              Deploy the configured services
  run                 Benchmark one service at a time
  run --batch         Benchmark all services phase by phase
  adhoc               Deploy, one cold start and warm load per service
  measure             Take one scheduled reading (--iteration N)
  finalize            Consolidate the day's readings into a report
  cleanup             Delete a run's services and readings
  report              Re-render a report from results JSON (--input)
  compare             Compare two results files (--baseline, --current)

Options:
  -c, --config        Config file (default: bench.config.json)
  -o, --output        Local report directory (default: ./results)
  -s, --services      Comma-separated services to include
      --gcs-bucket    Results bucket (env: GCS_RESULTS_BUCKET)
      --run-id        Run ID (default: generated, or d<yyyymmdd> for measure/finalize)
      --date          Reading date, YYYY-MM-DD (default: today, UTC)
      --no-jitter     Skip the startup jitter of measure/finalize
      --cleanup       Delete the run's services afterwards (run, adhoc)
  -h, --help          Show this help message
  -v, --version       Show version

Examples:
  coldstart-bench run --batch --services go-gin,node-fastify
  coldstart-bench measure --iteration 3
  coldstart-bench compare --baseline old/results.json --current new/results.json
`);
}

async function main() {
  const args = process.argv.slice(2);

  if (
    args.length === 0 ||
    args[0] === 'help' ||
    args[0] === '--help' ||
    args[0] === '-h'
  ) {
    printHelp();
    process.exit(0);
  }

  if (args[0] === '--version' || args[0] === '-v') {
    const { VERSION } = await import('../version.js');
    console.log(`coldstart-bench ${VERSION}`);
    process.exit(0);
  }

  const command = args[0];
  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    console.error('Run "coldstart-bench help" for usage information.');
    process.exit(1);
  }

  loadDotenv();
  const commandArgs = args.slice(1);
  const { error } = await import('./lib/ui.js');

  try {
    // Lazy-load commands for faster startup
    switch (command) {
      case 'deploy': {
        const { deploy } = await import('./commands/deploy.js');
        await deploy(commandArgs);
        break;
      }
      case 'run': {
        const { run } = await import('./commands/run.js');
        await run(commandArgs);
        break;
      }
      case 'adhoc': {
        const { adhoc } = await import('./commands/adhoc.js');
        await adhoc(commandArgs);
        break;
      }
      case 'measure': {
        const { measure } = await import('./commands/measure.js');
        await measure(commandArgs);
        break;
      }
      case 'finalize': {
        const { finalize } = await import('./commands/finalize.js');
        await finalize(commandArgs);
        break;
      }
      case 'cleanup': {
        const { cleanup } = await import('./commands/cleanup.js');
        await cleanup(commandArgs);
        break;
      }
      case 'report': {
        const { report } = await import('./commands/report.js');
        await report(commandArgs);
        break;
      }
      case 'compare': {
        const { compare } = await import('./commands/compare.js');
        await compare(commandArgs);
        break;
      }
      case 'help':
        printHelp();
        break;
    }
  } catch (err) {
    if (err instanceof CancelledError) {
      error('Cancelled');
      process.exit(130);
    }
    if (err instanceof ConfigError) {
      error(err.message);
    } else if (err instanceof Error) {
      error(`Error: ${err.message}`);
    } else {
      error('An unexpected error occurred');
    }
    process.exit(1);
  }
  // Keep-alive sockets and signal handlers would otherwise hold the process
  process.exit(0);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
