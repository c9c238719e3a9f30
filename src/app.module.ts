/**
 * @fileoverview Application Root Module
 *
 * Configures the console application with logging and the feature modules.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { ConfigModule } from './config/config.module';
import { loggerParams } from './config/logger.config';
import { ClockModule } from './shared/clock';
import { StorageModule } from './storage';
import { CatalogModule } from './catalog';
import { RosterModule } from './roster';
import { LendingModule } from './lending';
import { CliModule } from './cli';

@Module({
    imports: [
        // Shared modules
        ConfigModule,
        ClockModule,

        // Logging to stderr
        LoggerModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (config: ConfigService) =>
                loggerParams(config.get<string>('NODE_ENV'), config.get<string>('LOG_LEVEL')),
        }),

        // Feature modules
        StorageModule,
        CatalogModule,
        RosterModule,
        LendingModule,
        CliModule,
    ],
})
export class AppModule { }
