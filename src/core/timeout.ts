/**
 * Deadline for awaited work that carries no timeout of its own (database
 * reads and writes, DNS). Only the wait ends; the work is not cancelled.
 */

import { TimeoutError } from "./errors.js";

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}
