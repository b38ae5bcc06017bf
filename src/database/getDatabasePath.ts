import path from 'path';
import { fileURLToPath } from 'url';
import { DATABASE_PATH } from '../config.js';

export function getDatabasePath(): string {
  if (DATABASE_PATH) {
    return DATABASE_PATH;
  }

  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  return path.join(__dirname, '../../database/shift_schedule.db');
}
