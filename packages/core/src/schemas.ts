/**
 * Option schemas for probewire
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import { DEFAULT_PROTOCOL, DEFAULT_TIMEOUT_SEC, DEFAULT_TTL } from './constants.js';
import { InvalidArgumentError } from './errors.js';

const PortSchema = z.number().int().min(1).max(65535);
const OctetSchema = z.number().int().min(0).max(255);

/**
 * Options accepted by a single probe
 */
export const ProbeOptionsSchema = z
  .object({
    ipVersion: z
      .union([z.literal(4), z.literal(6)])
      .optional()
      .describe('IP version of the target; inferred when omitted'),
    ttl: z.number().int().min(1).max(255).default(DEFAULT_TTL).describe('Time-to-live'),
    protocol: z.enum(['icmp', 'udp', 'tcp', 'sctp']).default(DEFAULT_PROTOCOL),
    port: PortSchema.optional().describe('Destination port (non-ICMP only)'),
    localIp: z.string().ip().optional().describe('Source address'),
    localPort: PortSchema.optional().describe('Source port (non-ICMP only)'),
    timeout: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_TIMEOUT_SEC)
      .describe('Seconds to wait for a reply'),
    size: z.number().int().nonnegative().optional().describe('Packet size in bytes'),
    bitPattern: OctetSchema.optional().describe('Byte used to fill the payload'),
    tos: OctetSchema.optional().describe('Type-of-service / traffic class'),
    mark: z.number().int().nonnegative().optional().describe('Routing mark (SO_MARK)')
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.protocol !== 'icmp') return;
    if (options.port !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['port'],
        message: 'port is only meaningful for udp, tcp and sctp probes'
      });
    }
    if (options.localPort !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['localPort'],
        message: 'localPort is only meaningful for udp, tcp and sctp probes'
      });
    }
  });

export type ProbeOptions = z.input<typeof ProbeOptionsSchema>;
export type ResolvedProbeOptions = z.output<typeof ProbeOptionsSchema>;

/**
 * Data options of a probe client (functions such as the logger are passed alongside)
 */
export const ClientOptionsSchema = z.object({
  executable: z.string().min(1).optional().describe('Path or name of mtr-packet'),
  commandPrefix: z
    .array(z.string().min(1))
    .default([])
    .describe('Command placed in front of the executable, e.g. ["ip", "netns", "exec", "blue"]'),
  syntax: z.enum(['assign', 'pairs']).default('assign').describe('Argument layout on the wire'),
  env: z.record(z.string()).optional().describe('Extra environment for the subprocess')
});

export type ClientConfigInput = z.input<typeof ClientOptionsSchema>;
export type ClientConfig = z.output<typeof ClientOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

/**
 * Parse input against a schema, throwing InvalidArgumentError on failure
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid ${what}: ${formatIssues(parsed.error)}`, {
      cause: parsed.error
    });
  }
  return parsed.data;
}
