import { z } from 'zod';
import type { MetricsSource, TimeWindow } from '../types.js';
import { GoogleApiClient, type GoogleApiClientOptions } from './base-client.js';
import type { CloudRunLocation } from './services-client.js';

const MONITORING_API = 'https://monitoring.googleapis.com/v3';
const INSTANCE_COUNT_METRIC = 'run.googleapis.com/container/instance_count';

const PointSchema = z.object({
  interval: z.object({ endTime: z.string() }).passthrough(),
  value: z
    .object({
      int64Value: z.string().optional(),
      doubleValue: z.number().optional()
    })
    .passthrough()
});

const TimeSeriesListSchema = z.object({
  timeSeries: z
    .array(z.object({ points: z.array(PointSchema).optional() }).passthrough())
    .optional(),
  nextPageToken: z.string().optional()
});

type Point = z.infer<typeof PointSchema>;

/**
 * Reads Cloud Run's instance_count metric.
 *
 * The metric is reported per revision and per state (active/idle), so the
 * latest point of every series is summed: an update can leave an old
 * revision with live instances.
 */
export class CloudMonitoringClient
  extends GoogleApiClient
  implements MetricsSource
{
  constructor(
    private readonly location: CloudRunLocation,
    options: GoogleApiClientOptions
  ) {
    super(options);
  }

  async instanceCount(
    workloadName: string,
    window: TimeWindow,
    signal?: AbortSignal
  ): Promise<number> {
    let total = 0;
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({
        filter: [
          `metric.type="${INSTANCE_COUNT_METRIC}"`,
          'resource.type="cloud_run_revision"',
          `resource.labels.location="${this.location.region}"`,
          `resource.labels.service_name="${workloadName}"`
        ].join(' AND '),
        'interval.startTime': window.start.toISOString(),
        'interval.endTime': window.end.toISOString(),
        'aggregation.alignmentPeriod': '60s',
        'aggregation.perSeriesAligner': 'ALIGN_MAX'
      });
      if (pageToken) params.set('pageToken', pageToken);

      const page = await this.request(
        'timeSeries.list',
        'GET',
        `${MONITORING_API}/projects/${this.location.project}/timeSeries?${params}`,
        TimeSeriesListSchema,
        { signal }
      );

      for (const series of page.timeSeries ?? []) {
        total += latestValue(series.points ?? []);
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return total;
  }
}

function latestValue(points: Point[]): number {
  let latest: Point | undefined;
  for (const point of points) {
    if (!latest || point.interval.endTime > latest.interval.endTime) {
      latest = point;
    }
  }
  if (!latest) return 0;
  if (latest.value.int64Value !== undefined) {
    return Number(latest.value.int64Value);
  }
  return latest.value.doubleValue ?? 0;
}
