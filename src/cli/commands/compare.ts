/**
 * Compare two stored runs
 */
import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ConfigError } from '../../errors.js';
import { renderComparisonMarkdown } from '../../report/markdown-report.js';
import { compareResults } from '../../stats/comparison.js';
import { success } from '../lib/ui.js';
import { readResultFile } from './report.js';

export async function compare(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      baseline: { type: 'string' },
      current: { type: 'string' },
      output: { type: 'string', short: 'o' }
    }
  });

  if (!values.baseline || !values.current) {
    throw new ConfigError('--baseline and --current are required');
  }

  const comparison = compareResults(
    await readResultFile(values.baseline),
    await readResultFile(values.current)
  );
  const rendered = renderComparisonMarkdown(comparison);

  if (values.output) {
    await writeFile(values.output, rendered, 'utf-8');
    success(`Comparison written to ${values.output}`);
  } else {
    process.stdout.write(rendered);
  }
}
