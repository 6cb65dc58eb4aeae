/**
 * Full benchmark in one invocation: phased across all services with
 * --batch, otherwise one service at a time
 */
import { parseArgs } from 'node:util';
import { generateRunId } from '../../deploy/naming.js';
import { commonOptions, createContext, createOrchestrator, toCommonValues } from '../lib/context.js';
import { printSummary, saveReports } from '../lib/output.js';
import { bold, info } from '../lib/ui.js';

export async function run(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...commonOptions,
      batch: { type: 'boolean', short: 'b' },
      cleanup: { type: 'boolean' },
      'run-id': { type: 'string' }
    }
  });

  const runId = values['run-id'] ?? generateRunId();
  const context = await createContext(toCommonValues(values), runId);
  const orchestrator = createOrchestrator(context, runId);

  info(`Run ${bold(runId)} (${values.batch ? 'batch' : 'sequential'})`);
  const result = values.batch
    ? await orchestrator.runBatch()
    : await orchestrator.runSequential();

  printSummary(result);
  await saveReports(context, result, orchestrator);
  if (values.cleanup) {
    await orchestrator.cleanupWorkloads();
  }
}
