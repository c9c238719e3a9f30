export * from './library-error';
