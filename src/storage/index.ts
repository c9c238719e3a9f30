export * from './interfaces';
export * from './library.store';
export * from './storage.module';
export { encodeBook, encodeMember, decodeBooks, decodeMembers } from './storage.codec';
export { JsonFileStorage, ARTIFACT_FILES } from './json-file.storage';
