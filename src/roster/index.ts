export * from './roster.module';
export * from './roster.service';
export * from './interfaces';
export * from './dto/add-member.dto';
