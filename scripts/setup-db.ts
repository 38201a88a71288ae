import { loadConfig } from '../src/config';
import { initSchema, openDatabase } from '../src/database';

function setupDatabase() {
  try {
    const config = loadConfig();
    console.log(`Setting up database at ${config.databasePath}...`);

    const db = openDatabase(config.databasePath);
    initSchema(db);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .pluck()
      .all();
    console.log(`Tables: ${tables.join(', ')}`);

    db.close();

    console.log(' Database setup complete!');
    process.exit(0);
  } catch (error) {
    console.error(' Database setup failed:', error);
    process.exit(1);
  }
}

setupDatabase();
