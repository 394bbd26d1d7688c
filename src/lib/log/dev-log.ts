// src/lib/log/dev-log.ts

import { isDebugTraceEnabled, isDevLoggingEnabled } from "@/core/config/editor-config";

export type DevLogger = {
  /** Erreur avalée (moteur audio, callback hôte) : visible en dev uniquement. */
  warn: (where: string, err: unknown) => void;
  /** Trace des opérations ignorées (no-op), derrière PIANOROLL_DEBUG=1. */
  debug: (where: string, ...details: unknown[]) => void;
};

/**
 * Logger console préfixé `[scope:where]`.
 * Les flags sont relus à chaque appel pour que les tests
 * puissent basculer NODE_ENV / PIANOROLL_DEBUG.
 */
export function createDevLogger(scope: string): DevLogger {
  return {
    warn(where, err) {
      if (isDevLoggingEnabled()) {
        console.warn(`[${scope}:${where}]`, err);
      }
    },
    debug(where, ...details) {
      if (isDebugTraceEnabled()) {
        console.debug(`[${scope}:${where}]`, ...details);
      }
    },
  };
}
