import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { Logger } from '../logger.js';
import { getDatabasePath } from './getDatabasePath.js';

const logger = new Logger('db');

const dbPath = getDatabasePath();

logger.info(`Connecting to database at ${dbPath}`);
if (!fs.existsSync(dbPath)) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  logger.info('Database file does not exist, it will be created');
}

const db: Database.Database = new Database(dbPath);
db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

export default db;
