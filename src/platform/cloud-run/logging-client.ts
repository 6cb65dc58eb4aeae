import { z } from 'zod';
import type { LogEntry, LogQuery, LogSearch } from '../types.js';
import { GoogleApiClient, type GoogleApiClientOptions } from './base-client.js';

const LOGGING_API = 'https://logging.googleapis.com/v2';

const EntryListSchema = z.object({
  entries: z
    .array(
      z
        .object({
          timestamp: z.string(),
          textPayload: z.string().optional(),
          jsonPayload: z.record(z.unknown()).optional()
        })
        .passthrough()
    )
    .optional()
});

export class CloudLoggingClient extends GoogleApiClient implements LogSearch {
  constructor(
    private readonly project: string,
    options: GoogleApiClientOptions
  ) {
    super(options);
  }

  async search(query: LogQuery, signal?: AbortSignal): Promise<LogEntry[]> {
    const filter = [
      'resource.type="cloud_run_revision"',
      `resource.labels.service_name="${query.workloadName}"`,
      `timestamp>="${query.since.toISOString()}"`,
      `timestamp<="${query.until.toISOString()}"`,
      `textPayload:"${query.text.replace(/"/g, '\\"')}"`
    ].join(' AND ');

    const page = await this.request(
      'entries.list',
      'POST',
      `${LOGGING_API}/entries:list`,
      EntryListSchema,
      {
        body: {
          resourceNames: [`projects/${this.project}`],
          filter,
          orderBy: 'timestamp asc',
          pageSize: 20
        },
        signal
      }
    );

    return (page.entries ?? []).map((entry) => {
      const message = entry.jsonPayload?.message;
      return {
        timestamp: new Date(entry.timestamp),
        text: entry.textPayload ?? (typeof message === 'string' ? message : '')
      };
    });
  }
}
