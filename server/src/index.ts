import { loadConfig } from '../../src/config.js';
import { createContext } from '../../src/context.js';
import { openDatabase } from '../../src/db/database.js';
import { createApp } from './app.js';

const config = loadConfig();
const db = openDatabase(config.dbPath);
const app = createApp(createContext(db), {
  restoreKeepsBudgetPeriod: config.restoreKeepsBudgetPeriod,
});

const server = app.listen(config.apiPort, () => {
  console.log(`API server running on http://localhost:${config.apiPort}`);
});

process.on('SIGINT', () => {
  server.close(() => {
    db.close();
    process.exit(0);
  });
});
