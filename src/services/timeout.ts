// src/services/timeout.ts
// Upper bound on how long any single external call may take.

import { GenerationTimeoutError } from "../domain/errors.js";

export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  if (!(ms > 0)) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
