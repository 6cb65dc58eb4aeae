// Zod schemas - single source of truth for configuration validation and types
import { z } from 'zod';

export const ExecutionEnvironmentSchema = z.enum(['gen1', 'gen2']);

export const RequestTypeSchema = z.enum(['ping', 'command']);

export const ResourceProfileSchema = z.object({
  cpu: z.string().min(1).default('1'),
  memory: z.string().min(1).default('512Mi'),
  concurrency: z.number().int().positive().default(80),
  executionEnvironment: ExecutionEnvironmentSchema.default('gen2'),
  startupCpuBoost: z.boolean().default(false),
  maxInstances: z.number().int().positive().default(10)
});

export const BenchmarkParamsSchema = z.object({
  coldStartIterations: z.number().int().positive().default(10),
  scaleToZeroTimeoutSec: z.number().int().positive().default(1200),
  scaleToZeroPollIntervalSec: z.number().int().positive().default(30),
  warmRequests: z.number().int().positive().default(100),
  warmConcurrency: z.number().int().positive().default(10),
  requestType: RequestTypeSchema.default('ping'),
  requestTimeoutSec: z.number().int().positive().default(30),
  deployTimeoutSec: z.number().int().positive().default(300),
  readyTimeoutSec: z.number().int().positive().default(120),
  logCorrelationTimeoutSec: z.number().int().nonnegative().default(30),
  /** Fixed delay before scheduled measure/finalize work, off the minute boundary */
  startupJitterMs: z.number().int().nonnegative().default(37_300)
});

// Cloud Run service IDs: lowercase letters, digits and hyphens, starting with a letter
export const ServiceConfigSchema = z.object({
  name: z
    .string()
    .regex(
      /^[a-z][a-z0-9-]*$/,
      'Service name must start with a letter and contain only lowercase letters, digits and hyphens'
    ),
  image: z.string().min(1, 'Image reference cannot be empty'),
  profile: z.string().default('default'),
  path: z.string().startsWith('/').default('/'),
  env: z.record(z.string()).default({}),
  enabled: z.boolean().default(true)
});

export const SigningConfigSchema = z.object({
  seed: z.string().min(1).default('coldstart-bench-ed25519-test-key-seed-v1')
});

export const StorageConfigSchema = z.object({
  bucket: z.string().min(1).optional(),
  endpoint: z.string().url().default('https://storage.googleapis.com'),
  region: z.string().default('auto')
});

export const BenchConfigSchema = z
  .object({
    project: z.string().min(1, 'project is required'),
    region: z.string().min(1, 'region is required'),
    profiles: z.record(ResourceProfileSchema).default({}),
    benchmark: BenchmarkParamsSchema.default({}),
    services: z.array(ServiceConfigSchema).min(1, 'at least one service is required'),
    signing: SigningConfigSchema.default({}),
    storage: StorageConfigSchema.default({}),
    authenticatedInvoke: z.boolean().default(false)
  })
  .transform((config) => {
    const profiles: Record<string, ResourceProfile> = {
      default: ResourceProfileSchema.parse({}),
      ...config.profiles
    };
    return { ...config, profiles };
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.services.forEach((service, index) => {
      if (seen.has(service.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['services', index, 'name'],
          message: `Duplicate service name "${service.name}"`
        });
      }
      seen.add(service.name);
      if (!(service.profile in config.profiles)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['services', index, 'profile'],
          message: `Unknown profile "${service.profile}"`
        });
      }
    });
  });

// Infer TypeScript types from schemas
export type ExecutionEnvironment = z.infer<typeof ExecutionEnvironmentSchema>;
export type RequestType = z.infer<typeof RequestTypeSchema>;
export type ResourceProfile = z.infer<typeof ResourceProfileSchema>;
export type BenchmarkParams = z.infer<typeof BenchmarkParamsSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;

/** Raw, pre-validation config as read from disk */
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;
