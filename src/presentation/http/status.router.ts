import express, { NextFunction, Request, Response, Router } from 'express';
import { Logger } from '../../shared/logger';
import { HttpResult, StatusController } from './status.controller';

const logger = new Logger('HttpRouter');

type Handler = (req: Request) => HttpResult | Promise<HttpResult>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(handler(req))
      .then((result) => {
        res.status(result.status).json(result.body);
      })
      .catch(next);
  };
}

export function createStatusRouter(controller: StatusController): Router {
  const router = express.Router();

  router.get('/health', route(() => controller.health()));
  router.get('/reports/latest', route(() => controller.latestReport()));
  router.get('/events', route((req) => controller.recentEvents(req.query.limit)));
  router.post('/cycles', route(() => controller.runCycle()));
  // symbols are URL-encoded: /baselines/BTC%2FUSDT/ETH%2FUSDT
  router.put(
    '/baselines/:first/:second',
    route((req) => controller.setBaseline(req.params.first, req.params.second, req.body)),
  );

  return router;
}

export function createHttpServer(controller: StatusController): express.Express {
  const server = express();
  server.use(express.json());
  server.use(createStatusRouter(controller));
  server.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled request error', error);
    res.status(500).json({ error: 'internal error' });
  });
  return server;
}
