/**
 * @fileoverview Library Storage Interface
 *
 * Artifact-level persistence port. Implementations move whole record arrays
 * in and out; mapping to domain objects is the codec's job.
 */

export const LIBRARY_STORAGE = Symbol('LIBRARY_STORAGE');

export type ArtifactName = 'books' | 'members';

export type ArtifactContent =
    | { exists: false }
    | { exists: true; data: unknown };

export interface LibraryStorage {
    /** Parsed content of an artifact, or `exists: false` when there is none yet. */
    read(artifact: ArtifactName): Promise<ArtifactContent>;

    /** Overwrites the whole artifact. */
    write(artifact: ArtifactName, records: unknown[]): Promise<void>;

    /** Human-readable location, for logs */
    describe(artifact: ArtifactName): string;
}
