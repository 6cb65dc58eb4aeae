/**
 * One scheduled cold-start reading of the distributed workflow
 */
import { parseArgs } from 'node:util';
import { ConfigError } from '../../errors.js';
import { commonOptions, createContext, createOrchestrator, toCommonValues } from '../lib/context.js';
import { distributedOptions, resolveDistributedRun, startupJitter } from '../lib/distributed.js';
import { bold, info, success } from '../lib/ui.js';

function parseIteration(value: string | undefined): number {
  if (value === undefined) {
    throw new ConfigError('--iteration is required');
  }
  const iteration = Number(value);
  if (!Number.isInteger(iteration) || iteration < 0) {
    throw new ConfigError(`--iteration must be a non-negative integer, got "${value}"`);
  }
  return iteration;
}

export async function measure(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...commonOptions,
      ...distributedOptions,
      iteration: { type: 'string', short: 'i' }
    }
  });

  const iteration = parseIteration(values.iteration);
  const { date, runId } = resolveDistributedRun(values);
  const context = await createContext(toCommonValues(values), runId);
  await startupJitter(context, values['no-jitter'], context.logger);

  const store = context.remote ?? context.local;
  info(`Measurement ${iteration} of run ${bold(runId)} (${date})`);
  const reading = await createOrchestrator(context, runId, store).measure(date, iteration);

  const failed = Object.keys(reading.errors).length;
  const total = Object.keys(reading.measurements).length;
  success(`Reading saved to ${store.description} (${total - failed}/${total} ok)`);
}
