/**
 * Quick single-pass check: deploy, one cold start each, warm load, report
 */
import { parseArgs } from 'node:util';
import { generateRunId } from '../../deploy/naming.js';
import { commonOptions, createContext, createOrchestrator, toCommonValues } from '../lib/context.js';
import { printSummary, saveReports } from '../lib/output.js';
import { bold, info } from '../lib/ui.js';

export async function adhoc(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...commonOptions,
      'skip-wait': { type: 'boolean' },
      cleanup: { type: 'boolean' },
      'run-id': { type: 'string' }
    }
  });

  const runId = values['run-id'] ?? generateRunId();
  const context = await createContext(toCommonValues(values), runId);
  const orchestrator = createOrchestrator(context, runId);

  info(`Adhoc run ${bold(runId)}`);
  const result = await orchestrator.runAdhoc({ skipWait: values['skip-wait'] });

  printSummary(result);
  await saveReports(context, result, orchestrator);
  if (values.cleanup) {
    await orchestrator.cleanupWorkloads();
  }
}
