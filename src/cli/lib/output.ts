import { join } from 'node:path';
import { errorMessage } from '../../errors.js';
import type { BenchmarkResult } from '../../model.js';
import type { BatchOrchestrator } from '../../orchestrator/orchestrator.js';
import { rankByColdStart } from '../../report/markdown-report.js';
import { formatMs } from '../../report/format.js';
import type { BenchContext } from './context.js';
import { bold, dim, error, info, success } from './ui.js';

/**
 * Write the reports under --output and, unless the orchestrator already
 * did, upload them. Neither failure changes the exit code.
 */
export async function saveReports(
  context: BenchContext,
  result: BenchmarkResult,
  orchestrator?: BatchOrchestrator
): Promise<void> {
  try {
    const keys = await context.local.uploadReports(result);
    success(`Reports written to ${join(context.local.description, keys.markdown)}`);
  } catch (err) {
    error(`Failed to write local reports: ${errorMessage(err)}`);
  }

  if (orchestrator && context.remote) {
    const keys = await orchestrator.publish(result);
    if (keys) {
      success(`Reports uploaded to ${context.remote.description}/${keys.json}`);
    }
  }
}

export function printSummary(result: BenchmarkResult): void {
  console.log(`\n${bold('Cold start p50 by service')}`);
  for (const service of rankByColdStart(result.services)) {
    const cs = service.coldStart;
    if (service.deployment.error) {
      console.log(`  ${service.name}  ${dim('not deployed')}`);
      continue;
    }
    const warm = service.warm ? `, warm p50 ${formatMs(service.warm.p50Ms)}` : '';
    console.log(
      `  ${service.name}  ${formatMs(cs.p50Ms)} ${dim(`(${cs.successCount}/${cs.samples} ok${warm})`)}`
    );
  }
  const failed = result.services.filter((s) => s.errors.length > 0).length;
  if (failed > 0) {
    info(`${failed} service(s) reported errors; see the report for details`);
  }
}
