export { Database, type DatabaseConfig } from './Database';
