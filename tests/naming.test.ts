import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import {
  assertDistinctWorkloadNames,
  dateStamp,
  generateRunId,
  isoDate,
  runIdForDate,
  workloadName
} from '../src/deploy/naming.js';

describe('run IDs', () => {
  it('prefixes the UTC date and a random suffix', () => {
    const id = generateRunId(new Date('2026-10-19T23:59:00Z'));
    expect(id).toMatch(/^20261019-[0-9a-f]{4}$/);
  });

  it('gives scheduled runs of one day the same ID', () => {
    expect(runIdForDate('2026-10-19')).toBe('d20261019');
  });

  it('formats UTC dates', () => {
    const date = new Date('2026-01-05T01:00:00Z');
    expect(isoDate(date)).toBe('2026-01-05');
    expect(dateStamp(date)).toBe('20260105');
  });
});

describe('workloadName', () => {
  it('joins service and run ID', () => {
    expect(workloadName('go-gin', '20261019-ab12')).toBe('go-gin-20261019-ab12');
  });

  it('truncates the service part and keeps the run suffix', () => {
    const name = workloadName('a-very-long-service-name-that-keeps-going-and-going', '20261019-ab12');
    expect(name).toBe('a-very-long-service-name-that-keeps-20261019-ab12');
    expect(name).toHaveLength(49);
  });

  it('does not leave a double hyphen at the cut', () => {
    // 35 characters of service name fit before the suffix; the 35th is a hyphen
    const service = `${'x'.repeat(34)}-yyyy`;
    expect(workloadName(service, '20261019-ab12')).toBe(`${'x'.repeat(34)}-20261019-ab12`);
  });

  it('lowercases and replaces invalid characters', () => {
    expect(workloadName('Go_Gin', 'R1')).toBe('go-gin-r1');
  });
});

describe('assertDistinctWorkloadNames', () => {
  const longAlpha = 'a-very-long-service-name-that-keeps-going-alpha';
  const longBeta = 'a-very-long-service-name-that-keeps-going-beta';

  it('accepts names that stay distinct after truncation', () => {
    expect(() => assertDistinctWorkloadNames(['alpha', 'beta', longAlpha], '20261019-ab12')).not.toThrow();
  });

  it('rejects names that truncate onto the same workload', () => {
    let caught: unknown;
    try {
      assertDistinctWorkloadNames(['alpha', longAlpha, longBeta], '20261019-ab12');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      message: 'Service names must stay distinct as workload names for run 20261019-ab12',
      issues: [
        `"${longAlpha}" and "${longBeta}" both map to workload "a-very-long-service-name-that-keeps-20261019-ab12"`
      ]
    });
  });
});
