export * from './json';
export * from './id_generator';
export { inferCallerSource } from './caller';
export { errorMessage, isFileNotFound } from './errors';
