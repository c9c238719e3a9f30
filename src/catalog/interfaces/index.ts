export * from './book.interface';
