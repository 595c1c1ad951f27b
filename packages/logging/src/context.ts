import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    workspace_host: z.string().min(1).optional(),
    operation: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

/** Runs `operation` in a fresh scope. Fields of an enclosing scope are inherited unless overridden. */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  storage.run({...storage.getStore(), ...LogContextSchema.parse(context)}, operation);

export const getLogContext = (): LogContext | undefined => storage.getStore();

/** Mutates the current scope; a no-op returning undefined outside of one. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const scope = storage.getStore();
  if (scope) {
    Object.assign(scope, LogContextSchema.partial().parse(fields));
  }
  return scope;
};
