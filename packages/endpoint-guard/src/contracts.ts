import {z} from 'zod';

const NonEmptyStringSchema = z.string().trim().min(1);

export const DEFAULT_ALLOWED_HOST_SUFFIXES = [
  '.azuredatabricks.net',
  '.cloud.databricks.com',
  '.gcp.databricks.com'
] as const;

const HostSuffixSchema = NonEmptyStringSchema.transform(value => {
  const lowered = value.toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
});

export const EndpointGuardConfigSchema = z
  .object({
    allowed_host_suffixes: z.array(HostSuffixSchema).min(1).default([...DEFAULT_ALLOWED_HOST_SUFFIXES]),
    allowed_ports: z.array(z.number().int().min(1).max(65_535)).min(1).default([443]),
    dns_timeout_ms: z.number().int().min(100).max(10_000).default(2_000),
    probe_timeout_ms: z.number().int().min(100).max(30_000).default(5_000)
  })
  .strict();

export type EndpointGuardConfig = z.input<typeof EndpointGuardConfigSchema>;
export type ResolvedEndpointGuardConfig = z.output<typeof EndpointGuardConfigSchema>;

export const DestinationSchema = z
  .object({
    raw_address: z.string(),
    scheme: z.literal('https'),
    host: NonEmptyStringSchema,
    port: z.number().int().min(1).max(65_535),
    origin: z.string().url(),
    resolved_ips: z.array(NonEmptyStringSchema).min(1)
  })
  .strict();

export type Destination = z.infer<typeof DestinationSchema>;

export type DnsResolver = (input: {hostname: string}) => Promise<string[]> | string[];

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;
