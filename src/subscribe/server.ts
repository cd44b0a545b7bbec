import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import type { Server } from 'http';
import { OUTPUT_LAYOUT } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import { SubscribeController } from './controller.js';
import type { SignupSink } from './store.js';

export interface ServerAppOptions {
  /** Built site served as static files */
  siteDir: string;
  store: SignupSink;
}

/**
 * Unparseable request bodies are reported like any other bad submission
 */
const bodyErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  getLogger().debug(`Rejected request body: ${err instanceof Error ? err.message : String(err)}`);
  res.status(400).json({ ok: false, error: 'invalid_email' });
};

export function createServerApp(options: ServerAppOptions): Express {
  const app = express();
  const controller = new SubscribeController(options.store);

  app.disable('x-powered-by');

  app
    .route(`/${OUTPUT_LAYOUT.SUBSCRIBE_ENDPOINT}`)
    .post(
      express.urlencoded({ extended: false, limit: '16kb' }),
      express.json({ limit: '16kb' }),
      (req, res) => controller.subscribe(req, res)
    )
    .all((req, res) => controller.methodNotAllowed(req, res));

  app.use(express.static(options.siteDir, { extensions: ['html'] }));
  app.use(bodyErrorHandler);

  return app;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      getLogger().info(`Serving on http://localhost:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
