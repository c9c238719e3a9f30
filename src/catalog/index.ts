export * from './catalog.module';
export * from './catalog.service';
export * from './interfaces';
export * from './dto/add-book.dto';
