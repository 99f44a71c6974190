export { getDatabase, closeDatabase, openDatabase, checkDatabaseHealth } from './connection';
export { SCHEMA, initializeSchema } from './schema';
