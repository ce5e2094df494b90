import express from 'express';
import bodyParser from 'body-parser';
import type { Logger } from 'pino';
import { createPhoneBookController } from './controller/phoneBookController';
import { createPhoneBookRouter } from './routes/phoneBookRoutes';
import { makeHttpLogger } from './middleware/httpLogger';
import { errorProblemJson, notFoundProblemJson } from './middleware/problemJson';
import { PhoneBookStores } from './repo';

export interface AppOptions {
  stores: PhoneBookStores;
  logger: Logger;
}

export function createApp({ stores, logger }: AppOptions) {
  const app = express();
  app.disable('x-powered-by');

  app.use(makeHttpLogger(logger));
  app.use(bodyParser.json());

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use(createPhoneBookRouter(createPhoneBookController(stores)));

  app.use(notFoundProblemJson());
  app.use(errorProblemJson());

  return app;
}

export default createApp;
