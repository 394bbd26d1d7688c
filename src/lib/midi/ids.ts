// src/lib/midi/ids.ts

import { nanoid } from "nanoid";

/** Générateur d'identifiants de notes / points CC. */
export type IdGenerator = () => string;

export const defaultIdGenerator: IdGenerator = () => nanoid(10);

/** Générateur déterministe `prefix1`, `prefix2`… (tests, imports). */
export function createSequentialIdGenerator(prefix: string = "n"): IdGenerator {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next}`;
  };
}
