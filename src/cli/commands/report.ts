/**
 * Re-render reports from a stored results JSON
 */
import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ConfigError, errorMessage } from '../../errors.js';
import type { BenchmarkResult } from '../../model.js';
import { parseJsonReport, renderJsonReport } from '../../report/json-report.js';
import { renderMarkdownReport } from '../../report/markdown-report.js';
import { success } from '../lib/ui.js';

export async function readResultFile(path: string): Promise<BenchmarkResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(error)}`);
  }
  try {
    return parseJsonReport(text);
  } catch (error) {
    throw new ConfigError(`${path} is not a benchmark result: ${errorMessage(error)}`);
  }
}

export async function report(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      input: { type: 'string', short: 'i' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' }
    }
  });

  if (!values.input) {
    throw new ConfigError('--input is required');
  }
  const format = values.format ?? 'markdown';
  if (format !== 'markdown' && format !== 'json') {
    throw new ConfigError(`--format must be markdown or json, got "${format}"`);
  }

  const result = await readResultFile(values.input);
  const rendered =
    format === 'json' ? renderJsonReport(result) : renderMarkdownReport(result);

  if (values.output) {
    await writeFile(values.output, rendered, 'utf-8');
    success(`Report written to ${values.output}`);
  } else {
    process.stdout.write(rendered);
  }
}
