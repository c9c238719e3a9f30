/**
 * @fileoverview Storage Module
 *
 * Owns the library state and its persistence:
 * - JSON file storage for the books and members artifacts
 * - The {@link LibraryStore} loaded at startup and saved after each mutation
 */

import { Module } from '@nestjs/common';
import { LIBRARY_STORAGE } from './interfaces';
import { JsonFileStorage } from './json-file.storage';
import { LibraryStore } from './library.store';

@Module({
    providers: [
        { provide: LIBRARY_STORAGE, useClass: JsonFileStorage },
        LibraryStore,
    ],
    exports: [LibraryStore],
})
export class StorageModule { }
