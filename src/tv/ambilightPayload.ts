import { z } from 'zod';
import type { RGB, ZoneFrame } from '../types';

const zoneColorSchema = z.object({
  r: z.number().min(0).max(255),
  g: z.number().min(0).max(255),
  b: z.number().min(0).max(255),
});

const sideSchema = z.record(z.string(), zoneColorSchema);

/** `GET /<version>/ambilight/processed` */
export const ambilightPayloadSchema = z.object({
  layer1: z.object({
    left: sideSchema,
    top: sideSchema,
    right: sideSchema,
  }),
});

function sideColors(side: Record<string, z.infer<typeof zoneColorSchema>>): RGB[] {
  return Object.keys(side)
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => {
      const { r, g, b } = side[key];
      return [r, g, b];
    });
}

/**
 * Flatten the per-side payload into one zone frame.
 *
 * The TV numbers the right side bottom-up; it is reversed so zones run
 * continuously around the screen.
 */
export function parseAmbilightPayload(data: unknown, capturedAt: number): ZoneFrame {
  const { layer1 } = ambilightPayloadSchema.parse(data);
  const zones = [...sideColors(layer1.left), ...sideColors(layer1.top), ...sideColors(layer1.right).reverse()];
  return Object.freeze({ zones: Object.freeze(zones), capturedAt });
}
