export * from './cli.module';
export * from './library.cli';
export * from './format';
