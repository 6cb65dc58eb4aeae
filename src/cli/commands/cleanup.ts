/**
 * Delete a run's services and any leftover readings
 */
import { parseArgs } from 'node:util';
import { errorMessage } from '../../errors.js';
import { commonOptions, createContext, createOrchestrator, toCommonValues } from '../lib/context.js';
import { distributedOptions, resolveDistributedRun } from '../lib/distributed.js';
import { bold, info, success, warn } from '../lib/ui.js';

export async function cleanup(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: { ...commonOptions, ...distributedOptions }
  });

  const { date, runId } = resolveDistributedRun(values);
  const context = await createContext(toCommonValues(values), runId);

  info(`Cleaning up run ${bold(runId)}`);
  await createOrchestrator(context, runId).cleanupWorkloads();

  // Readings only exist for distributed runs, keyed by date
  if (values['run-id'] === undefined || values.date !== undefined) {
    const store = context.remote ?? context.local;
    try {
      const removed = await store.cleanupRun(date);
      success(`Removed ${removed} reading(s) for ${date}`);
    } catch (error) {
      warn(`Failed to remove readings: ${errorMessage(error)}`);
    }
  }
}
