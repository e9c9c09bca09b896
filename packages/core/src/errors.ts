/**
 * packages/core/src/errors.ts — Error types raised by the rendering core.
 *
 * Only layout can fail a frame. Content, wrapping and frame drawing degrade
 * visually instead of throwing.
 */

import type { TerminalSize } from "./layout/types.js";

/**
 * Error codes for deterministic core failures.
 *
 *   - QUAD_TERMINAL_TOO_SMALL: terminal (or a derived region) is below its minimum
 *   - QUAD_INVALID_PROPS: configuration rejected at construction time
 */
export type QuadrantErrorCode = "QUAD_TERMINAL_TOO_SMALL" | "QUAD_INVALID_PROPS";

/**
 * Error class for all deterministic core violations.
 * The `code` property identifies the specific violation.
 */
export class QuadrantError extends Error {
  override readonly name: string = "QuadrantError";
  readonly code: QuadrantErrorCode;

  constructor(code: QuadrantErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

function formatSize(size: TerminalSize): string {
  return `${String(size.rows)}x${String(size.cols)}`;
}

/**
 * Raised by the layout engine when the terminal cannot host the four regions.
 *
 * Callers are expected to show a raw error screen and retry on the next resize.
 */
export class TerminalTooSmallError extends QuadrantError {
  override readonly name: string = "TerminalTooSmallError";
  readonly current: TerminalSize;
  readonly minimum: TerminalSize;

  constructor(current: TerminalSize, minimum: TerminalSize) {
    super(
      "QUAD_TERMINAL_TOO_SMALL",
      `Terminal size ${formatSize(current)} is below minimum requirement ${formatSize(minimum)}`,
    );
    this.current = Object.freeze({ rows: current.rows, cols: current.cols });
    this.minimum = Object.freeze({ rows: minimum.rows, cols: minimum.cols });
  }
}

export function isTerminalTooSmallError(error: unknown): error is TerminalTooSmallError {
  return error instanceof TerminalTooSmallError;
}

export function invalidProps(detail: string): never {
  throw new QuadrantError("QUAD_INVALID_PROPS", detail);
}
