/**
 * Consolidate the day's readings into the final report
 */
import { parseArgs } from 'node:util';
import { commonOptions, createContext, createOrchestrator, toCommonValues } from '../lib/context.js';
import { distributedOptions, resolveDistributedRun, startupJitter } from '../lib/distributed.js';
import { printSummary, saveReports } from '../lib/output.js';
import { bold, info } from '../lib/ui.js';

export async function finalize(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: { ...commonOptions, ...distributedOptions }
  });

  const { date, runId } = resolveDistributedRun(values);
  const context = await createContext(toCommonValues(values), runId);
  await startupJitter(context, values['no-jitter'], context.logger);

  info(`Finalizing run ${bold(runId)} (${date})`);
  const store = context.remote ?? context.local;
  const result = await createOrchestrator(context, runId, store).finalize(date);

  printSummary(result);
  // finalize() already published to the reading store
  if (store !== context.local) {
    await saveReports(context, result);
  }
}
