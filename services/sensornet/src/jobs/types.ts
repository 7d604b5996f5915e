import { z } from 'zod';
import { spatialFilterSchema } from '../validation/geometry';

const isoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Expected an ISO-8601 datetime' })
  .transform((value) => new Date(value));

/**
 * Export arguments as they travel through the queue. Datetimes are ISO
 * strings on the wire.
 */
export const datadumpArgsSchema = z.object({
  network: z.string().min(1),
  nodes: z.array(z.string()).nullable().default(null),
  sensors: z.array(z.string()).nullable().default(null),
  features: z.array(z.string()).nullable().default(null),
  geom: spatialFilterSchema.nullable().default(null),
  start: isoDateSchema,
  end: isoDateSchema,
  limit: z.number().int().positive().nullable().default(null),
  offset: z.number().int().nonnegative().nullable().default(null)
});

export const datadumpJobPayloadSchema = z.object({
  kind: z.literal('observation_datadump'),
  ticket: z.string().min(1),
  args: datadumpArgsSchema
});

export type DatadumpArgs = z.output<typeof datadumpArgsSchema>;
export type DatadumpJobPayload = z.output<typeof datadumpJobPayloadSchema>;
export type DatadumpJobInput = z.input<typeof datadumpJobPayloadSchema>;

export type DatadumpResult = {
  url: string;
};

export function toJobInput(ticket: string, args: DatadumpArgs): DatadumpJobInput {
  return {
    kind: 'observation_datadump',
    ticket,
    args: {
      ...args,
      start: args.start.toISOString(),
      end: args.end.toISOString()
    }
  };
}
