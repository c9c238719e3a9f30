import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { CatalogService } from './catalog.service';

@Module({
    imports: [StorageModule],
    providers: [CatalogService],
    exports: [CatalogService],
})
export class CatalogModule { }
