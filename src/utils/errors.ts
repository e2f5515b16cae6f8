// src/utils/errors.ts
// Failure taxonomy shared by the forward aggregator and the attacker injector.

export const ToolErrorKind = {
    MissingFile: 'MISSING_FILE',
    MalformedInput: 'MALFORMED_INPUT',
    NotFound: 'NOT_FOUND',
    Conflict: 'CONFLICT',
    WriteFailed: 'WRITE_FAILED',
} as const;

export type ToolErrorKind = (typeof ToolErrorKind)[keyof typeof ToolErrorKind];

export interface ToolFailure {
    kind: ToolErrorKind;
    message: string;
    path?: string;
}

export type ToolResult<T> =
    | { success: true; value: T }
    | { success: false; error: ToolFailure };

export function ok<T>(value: T): ToolResult<T> {
    return { success: true, value };
}

export function fail<T = never>(kind: ToolErrorKind, message: string, path?: string): ToolResult<T> {
    const error: ToolFailure = path === undefined ? { kind, message } : { kind, message, path };
    return { success: false, error };
}

/** Best-effort text for an unknown thrown value. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
