import { z } from 'zod';

const PLACEHOLDER_VALUES = ['', 'replace_me', '192.168.1.X'];

const hostSchema = z
  .string()
  .trim()
  .refine((value) => !PLACEHOLDER_VALUES.includes(value), {
    message: 'must be set to the device IP address',
  });

/** Zone list as a number array, or the comma separated string form ("0, 1, 3") */
export const positionsSchema = z.union([
  z.array(z.number().int()),
  z.string().transform((value, ctx) => {
    const parts = value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    const positions = parts.map(Number);
    if (positions.some((position) => !Number.isInteger(position))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid positions "${value}"` });
      return z.NEVER;
    }
    return positions;
  }),
]);

const channelIdSchema = z.number().int().min(0).max(255);

export const lightListSchema = z.array(
  z.object({
    name: z.string().min(1),
    id: channelIdSchema,
    positions: positionsSchema,
  })
);

export const lightMapSchema = z.record(
  z.string().min(1),
  z.object({
    id: channelIdSchema,
    positions: positionsSchema,
  })
);

/** Old flat layout: A_name / A_id / A_positions ... H_positions */
export const legacyLightsSchema = z.record(z.string(), z.union([z.string(), z.number(), z.array(z.number())]));

export const ambilightTvSchema = z.object({
  ip: hostSchema,
  api_version: z.union([z.literal(1), z.literal(5), z.literal(6)]).default(6),
  protocol: z
    .string()
    .transform((value) => value.replace(/:\/\/$/, ''))
    .pipe(z.enum(['http', 'https']))
    .optional(),
  port: z.number().int().min(1).max(65535).optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  request_timeout_ms: z.number().int().positive().default(500),
  zone_count: z.number().int().positive().default(17),
  refresh_rate_ms: z.number().int().min(0).default(50),
  idle_refresh_rate_ms: z.number().int().positive().default(5000),
  transition_smoothing: z.number().min(0).max(0.95).default(0),
  black_screen_timeout_s: z.number().min(0).default(30),
  black_threshold: z.number().int().min(0).max(255).default(15),
  power_check_after_s: z.number().min(0).default(5),
  wait_for_startup_s: z.number().min(0).default(0),
  runtime_error_threshold: z.number().int().min(0).default(0),
  error_backoff_ms: z.number().int().min(0).default(3000),
  status_interval_s: z.number().positive().default(60),
});

export const hueEntertainmentSchema = z.object({
  ip: hostSchema,
  username: z.string().min(1).refine((value) => !PLACEHOLDER_VALUES.includes(value), {
    message: 'bridge credentials are not configured',
  }),
  client_key: z.string().regex(/^[0-9a-fA-F]{32}$/, 'must be 32 hex characters'),
  app_id: z.string().min(1).optional(),
  entertainment_config_id: z.string().uuid().optional(),
  index: z.number().int().min(0).default(0),
  send_timeout_ms: z.number().int().positive().default(100),
  max_consecutive_send_errors: z.number().int().positive().default(3),
});

export const configFileSchema = z.object({
  ambilight_tv: ambilightTvSchema,
  hue_entertainment_group: hueEntertainmentSchema,
  // shape is resolved by normalizeLights, which tries each accepted layout in turn
  lights_setup: z.unknown(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
