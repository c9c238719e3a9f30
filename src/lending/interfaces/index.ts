export * from './lending.interface';
