/**
 * Host Dependencies Contract
 * ==========================
 *
 * Structural interfaces for what services get from the host process.
 * Fastify's pino logger satisfies Logger; tests pass vi.fn() mocks.
 */

export interface Logger {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
