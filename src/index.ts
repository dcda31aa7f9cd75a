import pino from 'pino';
import { runService } from './service.js';

runService().then(
  () => process.exit(0),
  (err: unknown) => {
    pino().fatal({ err }, 'Fatal: failed to start server');
    process.exit(1);
  },
);
