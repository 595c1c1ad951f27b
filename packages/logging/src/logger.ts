import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {createRedactor, type Redactor} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

const OptionalContextFields = {
  workspace_host: z.string().min(1).optional(),
  operation: z.string().min(1).optional(),
  reason_code: z.string().min(1).optional(),
  duration_ms: z.number().int().gte(0).optional(),
  status_code: z.number().int().gte(100).lte(599).optional(),
  route: z.string().min(1).optional(),
  method: z.string().min(1).optional()
};

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    ...OptionalContextFields,
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export const LogEventSchema = z
  .object({
    ts: z.string().datetime(),
    level: EmittableLogLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1),
    request_id: z.string().min(1),
    ...OptionalContextFields,
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

type LineSink = {write: (line: string) => unknown};

export type StructuredLogWriter = {
  stdout: LineSink;
  stderr: LineSink;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const MetadataSchema = z.record(z.string(), z.unknown());

const withoutEmpty = (fields: Record<string, string | number | undefined>) =>
  Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined && value !== ''));

/** Explicit event fields win over the ambient request scope. */
const resolveContextFields = (input: LogEventInput, scope: LogContext = {}) => ({
  correlation_id: input.correlation_id ?? scope.correlation_id ?? 'n/a',
  request_id: input.request_id ?? scope.request_id ?? 'n/a',
  ...withoutEmpty({
    workspace_host: input.workspace_host ?? scope.workspace_host,
    operation: input.operation ?? scope.operation,
    route: input.route ?? scope.route,
    method: input.method ?? scope.method
  })
});

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const threshold = LEVEL_ORDER[LogLevelSchema.parse(options.level)];
  const writer = options.writer ?? defaultWriter;
  const now = options.now ?? (() => new Date());
  const redact: Redactor = createRedactor(
    options.extraSensitiveKeys ? {extraSensitiveKeys: options.extraSensitiveKeys} : {}
  );

  const toEnvelope = (input: LogEventInput): LogEvent =>
    LogEventSchema.parse({
      ts: now().toISOString(),
      level: input.level,
      service,
      env,
      event: input.event,
      component: input.component,
      ...resolveContextFields(input, getLogContext()),
      ...withoutEmpty({
        message: input.message,
        reason_code: input.reason_code,
        duration_ms: input.duration_ms,
        status_code: input.status_code
      }),
      metadata: MetadataSchema.parse(redact(input.metadata ?? {}))
    });

  const log = (rawInput: LogEventInput) => {
    const parsed = LogEventInputSchema.safeParse(rawInput);
    if (!parsed.success || LEVEL_ORDER[parsed.data.level] < threshold) {
      return;
    }

    const stream = parsed.data.level === 'error' || parsed.data.level === 'fatal' ? writer.stderr : writer.stdout;
    try {
      stream.write(`${JSON.stringify(toEnvelope(parsed.data))}\n`);
    } catch {
      // A failing sink drops the line.
    }
  };

  const atLevel =
    (level: EmittableLogLevel) =>
    (input: LevelInput) =>
      log({...input, level});

  return {
    log,
    debug: atLevel('debug'),
    info: atLevel('info'),
    warn: atLevel('warn'),
    error: atLevel('error'),
    fatal: atLevel('fatal')
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
