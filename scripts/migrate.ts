import { pathToFileURL } from 'url';
import { getDatabase, closeDatabase } from '../src/db/database.js';
import { applyMigrations } from '../src/db/migrations.js';
import { dbConfig } from '../src/config/database.js';

async function runMigration() {
  console.log(`Running migration for ${dbConfig.type} database...`);

  const db = getDatabase();

  try {
    const executed = await applyMigrations(db);
    console.log(`✅ Migration completed successfully! (${executed} statements)`);
  } catch (error) {
    console.error('❌ Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void runMigration();
}
