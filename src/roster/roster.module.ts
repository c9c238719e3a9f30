import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { RosterService } from './roster.service';

@Module({
    imports: [StorageModule],
    providers: [RosterService],
    exports: [RosterService],
})
export class RosterModule { }
