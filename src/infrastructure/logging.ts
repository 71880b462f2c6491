/**
 * Minimal structured logger accepted by infrastructure modules.
 *
 * Both a pino `Logger` and Fastify's `fastify.log` satisfy it.
 */
export type Log = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
};
