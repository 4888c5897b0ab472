/** Error taxonomy for layout operations. Failures are returned as results, never thrown through the tree. */

export type LayoutErrorCode =
  | "NotFound"
  | "Duplicate"
  | "InvalidArgument"
  | "VersionMismatch"
  | "IOFailure"
  | "RemovalInProgress";

export class LayoutError extends Error {
  readonly code: LayoutErrorCode;
  readonly detail?: Record<string, string>;

  constructor(code: LayoutErrorCode, message: string, detail?: Record<string, string>) {
    super(message);
    this.name = "LayoutError";
    this.code = code;
    this.detail = detail;
  }
}

export type Result<T> = ({ ok: true } & T) | { ok: false; error: LayoutError };

export function notFound(id: string): LayoutError {
  return new LayoutError("NotFound", `Node not found: ${id}`, { id });
}

export function duplicate(id: string): LayoutError {
  return new LayoutError("Duplicate", `Node id already in use: ${id}`, { id });
}

export function invalidArgument(message: string, detail?: Record<string, string>): LayoutError {
  return new LayoutError("InvalidArgument", message, detail);
}

export function versionMismatch(found: string, expected: string): LayoutError {
  return new LayoutError("VersionMismatch", `Incompatible layout version: ${found} (expected ${expected})`, {
    found,
    expected,
  });
}

export function ioFailure(path: string, reason: string): LayoutError {
  return new LayoutError("IOFailure", `${reason}: ${path}`, { path });
}

export function removalInProgress(id: string): LayoutError {
  return new LayoutError("RemovalInProgress", `Panel removal already in progress: ${id}`, { id });
}

/** Normalize anything caught from fs / JSON / sqlite into a message */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
