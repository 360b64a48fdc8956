// src/domain/errors.ts
// Typed failures that cross the digest boundary. Each carries a stable code.

import type { DigestErrorCode } from "./types.js";

export class DigestError extends Error {
  readonly code: DigestErrorCode;

  constructor(code: DigestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No learner context has been stored yet (progress.update never called). */
export class NoProgressConfiguredError extends DigestError {
  constructor() {
    super("NO_PROGRESS", "No progress found. Please set your learning progress first using progress.update.");
  }
}

/** The embedding model could not be loaded at startup; every embed call fails with this. */
export class ModelUnavailableError extends DigestError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("MODEL_UNAVAILABLE", `Embedding model unavailable: ${reason}`, options);
  }
}

export class InvalidRequestError extends DigestError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
  }
}

/** An external call exceeded its time budget. Treated as a per-candidate failure. */
export class GenerationTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "GenerationTimeoutError";
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
