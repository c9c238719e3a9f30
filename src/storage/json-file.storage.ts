import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { LibraryException } from '../shared/errors';
import { ArtifactContent, ArtifactName, LibraryStorage } from './interfaces';

export const ARTIFACT_FILES: Record<ArtifactName, string> = {
    books: 'books.json',
    members: 'members.json',
};

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores each artifact as a pretty-printed JSON array in the data directory.
 *
 * Writes overwrite the file in place: there is no temp file and rename, so a
 * crash mid-write can truncate an artifact.
 */
@Injectable()
export class JsonFileStorage implements LibraryStorage {
    private readonly logger = new Logger(JsonFileStorage.name);
    private readonly dataDir: string;

    constructor(private configService: ConfigService) {
        this.dataDir = path.resolve(this.configService.get<string>('LIBRARY_DATA_DIR') || '.');
    }

    describe(artifact: ArtifactName): string {
        return path.join(this.dataDir, ARTIFACT_FILES[artifact]);
    }

    async read(artifact: ArtifactName): Promise<ArtifactContent> {
        const file = this.describe(artifact);

        let text: string;
        try {
            text = await readFile(file, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                this.logger.debug({ msg: 'Storage artifact not found', artifact, file });
                return { exists: false };
            }
            throw error;
        }

        try {
            return { exists: true, data: JSON.parse(text) };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new LibraryException(
                'MalformedStorage',
                `Malformed ${artifact} storage: ${file} is not valid JSON (${reason})`,
            );
        }
    }

    async write(artifact: ArtifactName, records: unknown[]): Promise<void> {
        const file = this.describe(artifact);
        await mkdir(this.dataDir, { recursive: true });
        await writeFile(file, JSON.stringify(records, null, 2), 'utf-8');
    }
}
