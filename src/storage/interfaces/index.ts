export * from './storage-records.interface';
export * from './library-storage.interface';
