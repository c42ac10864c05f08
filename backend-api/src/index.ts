import 'dotenv/config';

import { createApp } from './app.js';
import { openSqlite, resolveDbPath } from './database/db.js';
import { recomputeAll } from './services/credit/creditLedgerService.js';
import { resolveLedgerConfig } from './services/ledgerConfigService.js';
import { errorMessage, logError, logInfo } from './utils/logger.js';

const port = Number(process.env.PORT ?? 3001);
// Listens on localhost unless HOST says otherwise.
const host = process.env.HOST ?? '127.0.0.1';

function bootstrap() {
  const dbPath = resolveDbPath();
  const { db } = openSqlite(dbPath);

  // Brings every RO in line with stage settings that may have changed while we were down.
  const r = recomputeAll(db, resolveLedgerConfig(db));
  logInfo('startup recompute done', { processed: r.processed, failed: r.failed.length }, { critical: true });

  const app = createApp(db);
  app.listen(port, host, () => {
    logInfo(`listening on ${host}:${port}`, { dbPath }, { critical: true });
  });
}

try {
  bootstrap();
} catch (e) {
  logError('startup failed', { error: errorMessage(e) });
  process.exit(1);
}
