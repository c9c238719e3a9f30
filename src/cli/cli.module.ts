import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { LendingModule } from '../lending/lending.module';
import { RosterModule } from '../roster/roster.module';
import { StorageModule } from '../storage/storage.module';
import { LibraryCli } from './library.cli';

@Module({
    imports: [StorageModule, CatalogModule, RosterModule, LendingModule],
    providers: [LibraryCli],
    exports: [LibraryCli],
})
export class CliModule { }
