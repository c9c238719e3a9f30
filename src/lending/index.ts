export * from './lending.module';
export * from './lending.service';
export * from './interfaces';
