/**
 * @fileoverview Library Error Taxonomy
 *
 * Every catalog, roster and lending operation answers with a {@link Result}
 * instead of throwing. The only thrown failure is {@link LibraryException},
 * raised while loading storage (which aborts startup).
 */

export type LibraryErrorKind =
    | 'NotFound'
    | 'NoCopiesAvailable'
    | 'InvalidArgument'
    | 'MalformedStorage';

export interface LibraryError {
    kind: LibraryErrorKind;
    message: string;
}

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: LibraryError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T = never>(kind: LibraryErrorKind, message: string): Result<T> {
    return { ok: false, error: { kind, message } };
}

export class LibraryException extends Error {
    constructor(
        public readonly kind: LibraryErrorKind,
        message: string,
    ) {
        super(message);
        this.name = 'LibraryException';
    }

    toLibraryError(): LibraryError {
        return { kind: this.kind, message: this.message };
    }
}
