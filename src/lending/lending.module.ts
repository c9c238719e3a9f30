/**
 * @fileoverview Lending Module
 *
 * Borrow/return bookkeeping across the catalog and roster, plus the
 * member-wise summaries built from it.
 */

import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { LendingService } from './lending.service';

@Module({
    imports: [StorageModule],
    providers: [LendingService],
    exports: [LendingService],
})
export class LendingModule { }
