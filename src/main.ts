#!/usr/bin/env node
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EXIT_FAILED, formatFailure, LibraryCli } from './cli';
import { LibraryException } from './shared/errors';

async function bootstrap(): Promise<number> {
    const app = await NestFactory.createApplicationContext(AppModule, {
        bufferLogs: true,
        abortOnError: false,
    });

    // Use Pino logger
    app.useLogger(app.get(Logger));

    try {
        return await app.get(LibraryCli).run(process.argv.slice(2));
    } finally {
        // Triggers the final save in LibraryStore
        await app.close();
    }
}

bootstrap()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        if (error instanceof LibraryException) {
            console.error(formatFailure(error.toLibraryError()));
        } else {
            console.error('Library failed:', error);
        }
        process.exitCode = EXIT_FAILED;
    });
