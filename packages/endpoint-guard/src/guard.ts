import {lookup as dnsLookup} from 'node:dns/promises';
import {BlockList, isIP} from 'node:net';
import {domainToASCII} from 'node:url';

import {createNoopLogger, type StructuredLogger} from '@share-gateway/logging';

import {
  EndpointGuardConfigSchema,
  type Destination,
  type DnsResolver,
  type EndpointGuardConfig,
  type FetchLike,
  type ResolvedEndpointGuardConfig
} from './contracts';
import {err, ok, type GuardResult} from './errors';

const LOOPBACK_CIDR_RANGES = ['127.0.0.0/8', '::1/128', '::ffff:127.0.0.0/104'] as const;

const LINK_LOCAL_CIDR_RANGES = ['169.254.0.0/16', 'fe80::/10', '::ffff:169.254.0.0/112'] as const;

const METADATA_CIDR_RANGES = [
  '169.254.169.254/32',
  '168.63.129.16/32',
  'fd00:ec2::254/128'
] as const;

type IpFamily = 'ipv4' | 'ipv6';

type CidrRange = `${string}/${number}`;

const getIpFamily = (value: string): IpFamily | null => {
  const ipVersion = isIP(value);
  if (ipVersion === 4) {
    return 'ipv4';
  }
  if (ipVersion === 6) {
    return 'ipv6';
  }
  return null;
};

const normalizeHostValue = (value: string): string | null => {
  const trimmed = value.trim().toLowerCase();
  if (trimmed.length === 0) {
    return null;
  }

  const withoutBrackets =
    trimmed.startsWith('[') && trimmed.endsWith(']') ? trimmed.slice(1, -1) : trimmed;
  const withoutTrailingDot = withoutBrackets.endsWith('.')
    ? withoutBrackets.slice(0, -1)
    : withoutBrackets;

  if (withoutTrailingDot.length === 0) {
    return null;
  }

  if (getIpFamily(withoutTrailingDot)) {
    return withoutTrailingDot;
  }

  const asciiDomain = domainToASCII(withoutTrailingDot);
  if (!asciiDomain) {
    return null;
  }

  return asciiDomain.toLowerCase();
};

const parseCidrRange = (value: CidrRange): {network: string; prefix: number; family: IpFamily} => {
  const [network, prefixText] = value.split('/', 2);
  const family = getIpFamily(network);
  const prefix = Number.parseInt(prefixText ?? '', 10);

  if (!family) {
    throw new Error(`Invalid CIDR range network: ${value}`);
  }

  if (!Number.isInteger(prefix)) {
    throw new Error(`Invalid CIDR range prefix: ${value}`);
  }

  const maxPrefix = family === 'ipv4' ? 32 : 128;
  if (prefix < 0 || prefix > maxPrefix) {
    throw new Error(`CIDR prefix out of bounds: ${value}`);
  }

  return {network, prefix, family};
};

const buildBlockList = (ranges: readonly CidrRange[]): BlockList => {
  const blockList = new BlockList();
  for (const range of ranges) {
    const parsedRange = parseCidrRange(range);
    blockList.addSubnet(parsedRange.network, parsedRange.prefix, parsedRange.family);
  }
  return blockList;
};

const LOOPBACK_BLOCKLIST = buildBlockList(LOOPBACK_CIDR_RANGES);
const LINK_LOCAL_BLOCKLIST = buildBlockList(LINK_LOCAL_CIDR_RANGES);
const METADATA_BLOCKLIST = buildBlockList(METADATA_CIDR_RANGES);

const matchDeniedRange = ({address, family}: {address: string; family: IpFamily}): string | null => {
  if (METADATA_BLOCKLIST.check(address, family)) {
    return 'metadata';
  }
  if (LOOPBACK_BLOCKLIST.check(address, family)) {
    return 'loopback';
  }
  if (LINK_LOCAL_BLOCKLIST.check(address, family)) {
    return 'link-local';
  }
  return null;
};

const matchesAllowedSuffix = ({host, suffixes}: {host: string; suffixes: readonly string[]}) =>
  suffixes.some(suffix => {
    if (!host.endsWith(suffix)) {
      return false;
    }
    const prefix = host.slice(0, -suffix.length);
    return prefix.length > 0 && !prefix.endsWith('.');
  });

type ValidatedAddress = {
  parsedUrl: URL;
  host: string;
  port: number;
};

const validateAddressSyntax = ({
  rawAddress,
  config
}: {
  rawAddress: string;
  config: ResolvedEndpointGuardConfig;
}): GuardResult<ValidatedAddress> => {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(rawAddress.trim());
  } catch {
    return err('endpoint_url_invalid', `Workspace URL is not a valid URL: ${rawAddress}`);
  }

  if (parsedUrl.username.length > 0 || parsedUrl.password.length > 0) {
    return err('endpoint_userinfo_forbidden', 'Workspace URL userinfo is forbidden');
  }

  if (parsedUrl.hash.length > 0) {
    return err('endpoint_fragment_forbidden', 'Workspace URL fragment is forbidden');
  }

  const scheme = parsedUrl.protocol.replace(/:$/u, '').toLowerCase();
  if (scheme !== 'https') {
    return err('endpoint_scheme_not_allowed', `Workspace URL scheme is not allowed: ${scheme}`);
  }

  const host = normalizeHostValue(parsedUrl.hostname);
  if (!host) {
    return err('endpoint_url_invalid', `Workspace URL host is invalid: ${parsedUrl.hostname}`);
  }

  if (getIpFamily(host) !== null) {
    return err('endpoint_ip_literal_forbidden', `Workspace URL host must be a DNS name: ${host}`);
  }

  if (!matchesAllowedSuffix({host, suffixes: config.allowed_host_suffixes})) {
    return err('endpoint_host_not_allowed', `Workspace host is not allowed: ${host}`);
  }

  const port = parsedUrl.port.length > 0 ? Number.parseInt(parsedUrl.port, 10) : 443;
  if (!config.allowed_ports.includes(port)) {
    return err('endpoint_port_not_allowed', `Workspace URL port is not allowed: ${port}`);
  }

  return ok({parsedUrl, host, port});
};

const resolveWithTimeout = async ({
  hostname,
  resolver,
  timeoutMs
}: {
  hostname: string;
  resolver: DnsResolver;
  timeoutMs: number;
}): Promise<GuardResult<string[]>> => {
  let timeoutHandle: NodeJS.Timeout | null = null;

  try {
    const timeoutPromise = new Promise<string[]>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new Error('dns_timeout'));
      }, timeoutMs);
    });

    const resolved = await Promise.race([Promise.resolve(resolver({hostname})), timeoutPromise]);
    return ok(resolved);
  } catch {
    return err('dns_resolution_failed', `DNS resolution failed for host ${hostname}`);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
};

const defaultDnsResolver: DnsResolver = async ({hostname}) => {
  const records = await dnsLookup(hostname, {all: true, verbatim: true});
  return records.map(record => record.address);
};

const validateResolvedAddresses = (addresses: string[]): GuardResult<string[]> => {
  const normalizedAddresses: string[] = [];
  const seen = new Set<string>();

  for (const rawAddress of addresses) {
    const normalizedAddress = normalizeHostValue(rawAddress);
    const family = normalizedAddress ? getIpFamily(normalizedAddress) : null;
    if (!normalizedAddress || !family) {
      return err('dns_resolution_failed', `Resolved address is not an IP literal: ${rawAddress}`);
    }

    const deniedRange = matchDeniedRange({address: normalizedAddress, family});
    if (deniedRange) {
      return err('resolved_ip_denied', `Resolved address ${normalizedAddress} is in a denied ${deniedRange} range`);
    }

    if (!seen.has(normalizedAddress)) {
      seen.add(normalizedAddress);
      normalizedAddresses.push(normalizedAddress);
    }
  }

  if (normalizedAddresses.length === 0) {
    return err('dns_resolution_empty', 'DNS resolution returned no IP addresses');
  }

  return ok(normalizedAddresses);
};

const probeOrigin = async ({
  origin,
  fetchImpl,
  timeoutMs
}: {
  origin: string;
  fetchImpl: FetchLike;
  timeoutMs: number;
}): Promise<GuardResult<number>> => {
  try {
    const response = await fetchImpl(origin, {
      method: 'HEAD',
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs)
    });
    return ok(response.status);
  } catch (error) {
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return err('probe_timeout', `Workspace probe timed out after ${timeoutMs}ms`);
    }
    return err(
      'probe_failed',
      error instanceof Error ? `Workspace probe failed: ${error.message}` : 'Workspace probe failed'
    );
  }
};

export type EndpointValidatorOptions = {
  config?: EndpointGuardConfig;
  dns_resolver?: DnsResolver;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
};

export type EndpointValidator = (rawAddress: string) => Promise<GuardResult<Destination>>;

export const createEndpointValidator = ({
  config = {},
  dns_resolver: dnsResolver = defaultDnsResolver,
  fetchImpl = fetch,
  logger = createNoopLogger()
}: EndpointValidatorOptions = {}): EndpointValidator => {
  const parsedConfig = EndpointGuardConfigSchema.parse(config);

  const validate = async (rawAddress: string): Promise<GuardResult<Destination>> => {
    const syntax = validateAddressSyntax({rawAddress, config: parsedConfig});
    if (!syntax.ok) {
      return syntax;
    }

    const resolved = await resolveWithTimeout({
      hostname: syntax.value.host,
      resolver: dnsResolver,
      timeoutMs: parsedConfig.dns_timeout_ms
    });
    if (!resolved.ok) {
      return resolved;
    }

    const addresses = validateResolvedAddresses(resolved.value);
    if (!addresses.ok) {
      return addresses;
    }

    const origin = syntax.value.parsedUrl.origin;
    const probe = await probeOrigin({origin, fetchImpl, timeoutMs: parsedConfig.probe_timeout_ms});
    if (!probe.ok) {
      return probe;
    }

    return ok({
      raw_address: rawAddress,
      scheme: 'https',
      host: syntax.value.host,
      port: syntax.value.port,
      origin,
      resolved_ips: addresses.value
    });
  };

  return async rawAddress => {
    const result = await validate(rawAddress);
    if (!result.ok) {
      logger.warn({
        event: 'endpoint.validation.rejected',
        component: 'endpoint.guard',
        message: result.error.message,
        reason_code: result.error.code,
        metadata: {kind: result.error.kind}
      });
    }
    return result;
  };
};

export const validateEndpoint = ({
  rawAddress,
  options
}: {
  rawAddress: string;
  options?: EndpointValidatorOptions;
}): Promise<GuardResult<Destination>> => createEndpointValidator(options)(rawAddress);
