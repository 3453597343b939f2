import 'dotenv/config';

export const dbConfig = {
  // Environment-based database selection
  type: process.env.NODE_ENV === 'production' && process.env.DB_HOST ? 'postgres' as const : 'sqlite' as const,

  // SQLite config (development)
  sqlite: {
    filename: process.env.SQLITE_DB_PATH || './data/content-coding.sqlite3',
  },

  // PostgreSQL config (production)
  postgres: {
    host: process.env.DB_HOST,
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME,
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    ssl: process.env.NODE_ENV === 'production',
  },
};
