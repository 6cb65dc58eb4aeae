/**
 * Deploy the configured services without measuring anything
 */
import { parseArgs } from 'node:util';
import { generateRunId } from '../../deploy/naming.js';
import { commonOptions, createContext, toCommonValues } from '../lib/context.js';
import { bold, error, info, success } from '../lib/ui.js';

export async function deploy(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...commonOptions,
      'run-id': { type: 'string' }
    }
  });

  const runId = values['run-id'] ?? generateRunId();
  const context = await createContext(toCommonValues(values), runId);
  info(`Deploying ${context.config.services.length} service(s) for run ${bold(runId)}`);

  const outcomes = await Promise.all(
    context.config.services.map((service) =>
      context.deployer.deploy(
        { service, profile: context.config.profiles[service.profile], runId },
        context.signal
      )
    )
  );

  for (const outcome of outcomes) {
    if (outcome.ok) {
      success(`${bold(outcome.serviceName)} ${outcome.url}`);
    } else {
      error(`${bold(outcome.serviceName)} ${outcome.error}`);
    }
  }
}
