import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { createApp, createLedger } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const db = new DatabaseAdapter(env);
const ledger = createLedger(db, env);
const app = createApp(db, ledger, env);

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    closePolicy: env.CLOSE_POLICY,
    recurrenceAutoExpand: env.RECURRENCE_AUTO_EXPAND,
  });
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
