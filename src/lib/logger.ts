/**
 * Structured logging utility
 */

export type LogMeta = Record<string, unknown>;

function formatMeta(meta?: LogMeta): string {
  return meta ? JSON.stringify(meta) : "";
}

/**
 * Message of an unknown thrown value, for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  debug: (msg: string, meta?: LogMeta) => {
    if (process.env.DEBUG) {
      console.log(`[DEBUG] ${msg}`, formatMeta(meta));
    }
  },

  info: (msg: string, meta?: LogMeta) => {
    console.log(`[INFO] ${msg}`, formatMeta(meta));
  },

  warn: (msg: string, meta?: LogMeta) => {
    console.warn(`[WARN] ${msg}`, formatMeta(meta));
  },

  error: (msg: string, error?: unknown) => {
    if (error === undefined) {
      console.error(`[ERROR] ${msg}`);
    } else if (error instanceof Error || typeof error === "string") {
      console.error(`[ERROR] ${msg}`, describeError(error));
    } else {
      console.error(`[ERROR] ${msg}`, JSON.stringify(error));
    }
  },
};
