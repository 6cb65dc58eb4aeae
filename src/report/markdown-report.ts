/**
 * Human-readable Markdown report
 */
import type { BenchmarkResult, ServiceResult } from '../model.js';
import type { Comparison, MetricDelta } from '../stats/comparison.js';
import {
  formatBytes,
  formatDuration,
  formatMs,
  formatPercent
} from './format.js';

function table(headers: string[], rows: string[][]): string {
  const lines = [
    `| ${headers.join(' | ')} |`,
    `|${headers.map(() => '---').join('|')}|`,
    ...rows.map((row) => `| ${row.join(' | ')} |`)
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Services ranked by cold-start p50; services without a successful sample
 * go last in name order.
 */
export function rankByColdStart(services: ServiceResult[]): ServiceResult[] {
  return [...services].sort((a, b) => {
    const aMeasured = a.coldStart.successCount > 0;
    const bMeasured = b.coldStart.successCount > 0;
    if (aMeasured !== bMeasured) return aMeasured ? -1 : 1;
    if (aMeasured && a.coldStart.p50Ms !== b.coldStart.p50Ms) {
      return a.coldStart.p50Ms - b.coldStart.p50Ms;
    }
    return a.name.localeCompare(b.name);
  });
}

export function renderMarkdownReport(result: BenchmarkResult): string {
  const { benchmark } = result.config;
  const ranked = rankByColdStart(result.services);
  const deployed = result.services.filter((s) => !s.deployment.error);
  const durationMs =
    new Date(result.finishedAt).getTime() - new Date(result.startedAt).getTime();

  let md = '# Cold Start Benchmark Results\n\n';
  md += `**Run ID:** ${result.runId}\n`;
  md += `**Mode:** ${result.mode}\n`;
  md += `**Project / Region:** ${result.config.project} / ${result.config.region}\n`;
  md += `**Started:** ${result.startedAt}\n`;
  md += `**Duration:** ${formatDuration(Math.max(0, durationMs))}\n`;
  md += `**Cold-start iterations:** ${benchmark.coldStartIterations}\n`;
  md += `**Warm requests:** ${benchmark.warmRequests} @ concurrency ${benchmark.warmConcurrency}\n\n`;

  md += '## Summary\n\n';
  md += `- Services: ${result.services.length} (${deployed.length} deployed, ${result.services.length - deployed.length} failed)\n`;
  const measured = ranked.filter((s) => s.coldStart.successCount > 0);
  if (measured.length > 0) {
    const fastest = measured[0];
    const slowest = measured[measured.length - 1];
    md += `- Fastest cold start: ${fastest.name} (p50 ${formatMs(fastest.coldStart.p50Ms)})\n`;
    md += `- Slowest cold start: ${slowest.name} (p50 ${formatMs(slowest.coldStart.p50Ms)})\n`;
  }
  md += '\n';

  md += '## Cold Start Latency\n\n';
  md += table(
    ['Rank', 'Service', 'Samples', 'OK', 'Failed', 'Min', 'P50', 'P95', 'P99', 'Max', 'Avg', 'Startup (logs)'],
    ranked.map((s, index) => {
      const cs = s.coldStart;
      return [
        String(index + 1),
        s.name,
        String(cs.samples),
        String(cs.successCount),
        String(cs.failureCount),
        formatMs(cs.minMs),
        formatMs(cs.p50Ms),
        formatMs(cs.p95Ms),
        formatMs(cs.p99Ms),
        formatMs(cs.maxMs),
        formatMs(cs.avgMs),
        cs.avgContainerStartupMs === undefined ? '-' : formatMs(cs.avgContainerStartupMs)
      ];
    })
  );
  md += '\n';

  md += '## Warm Request Latency\n\n';
  md += table(
    ['Service', 'Requests', 'Success', 'RPS', 'Min', 'P50', 'P95', 'P99', 'Max', 'Avg'],
    result.services.flatMap((s) => {
      const warm = s.warm;
      if (!warm) return [];
      return [
        [
          s.name,
          String(warm.totalRequests),
          formatPercent(warm.successCount, warm.totalRequests),
          warm.requestsPerSecond.toFixed(1),
          formatMs(warm.minMs),
          formatMs(warm.p50Ms),
          formatMs(warm.p95Ms),
          formatMs(warm.p99Ms),
          formatMs(warm.maxMs),
          formatMs(warm.avgMs)
        ]
      ];
    })
  );
  md += '\n';

  md += '## Deployments\n\n';
  md += table(
    ['Service', 'Image', 'Profile', 'Deploy time', 'Image size', 'URL'],
    result.services.map((s) => [
      s.name,
      `\`${s.deployment.image}\``,
      s.deployment.profile,
      formatDuration(s.deployment.deployDurationMs),
      formatBytes(s.deployment.imageSizeBytes),
      s.deployment.url ?? 'failed'
    ])
  );

  const withErrors = result.services.filter((s) => s.errors.length > 0);
  if (withErrors.length > 0) {
    md += '\n## Errors\n\n';
    for (const service of withErrors) {
      md += `### ${service.name}\n\n`;
      for (const message of service.errors) {
        md += `- ${message}\n`;
      }
      md += '\n';
    }
  }

  return md;
}

function formatRatio(d: MetricDelta): string {
  return d.ratio === null ? '-' : `${d.ratio.toFixed(2)}x`;
}

function formatDelta(d: MetricDelta): string {
  const sign = d.deltaMs > 0 ? '+' : '';
  return `${sign}${formatMs(d.deltaMs)}`;
}

export function renderComparisonMarkdown(comparison: Comparison): string {
  let md = '# Benchmark Comparison\n\n';
  md += `**Baseline:** ${comparison.baselineRunId}\n`;
  md += `**Current:** ${comparison.currentRunId}\n\n`;

  md += '## Findings\n\n';
  for (const finding of comparison.findings) {
    md += `- ${finding}\n`;
  }
  md += '\n';

  md += '## Per-Service P50\n\n';
  md += table(
    ['Service', 'Cold baseline', 'Cold current', 'Cold delta', 'Cold ratio', 'Warm baseline', 'Warm current', 'Warm ratio'],
    comparison.services.map((s) => [
      s.name,
      formatMs(s.coldStartP50.baselineMs),
      formatMs(s.coldStartP50.currentMs),
      formatDelta(s.coldStartP50),
      formatRatio(s.coldStartP50),
      formatMs(s.warmP50.baselineMs),
      formatMs(s.warmP50.currentMs),
      formatRatio(s.warmP50)
    ])
  );

  if (comparison.onlyInBaseline.length > 0 || comparison.onlyInCurrent.length > 0) {
    md += '\n## Skipped\n\n';
    if (comparison.onlyInBaseline.length > 0) {
      md += `- Only in baseline: ${comparison.onlyInBaseline.join(', ')}\n`;
    }
    if (comparison.onlyInCurrent.length > 0) {
      md += `- Only in current: ${comparison.onlyInCurrent.join(', ')}\n`;
    }
  }

  return md;
}
