export {
  closeDb,
  dbHealthcheck,
  getSql,
  normalizeQueryParams,
  query,
  type Queryable,
  type QueryResult,
  type QueryRow
} from './client.js';
export { loadDbConfig, type DbConfig } from './pool-config.js';
