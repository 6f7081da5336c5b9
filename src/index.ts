import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { config } from './core/config';
import { logger } from './core/logger';
import { DashboardError, ValidationError } from './core/errors';
import { DashboardService, dashboardService } from './services/dashboard.service';
import { SessionContextService, sessionContextService } from './services/session-context.service';
import { parseActivityFilters, parseBody, parseContactFilters, parseLimit } from './utils/query-parser';
import { secureLog } from './utils/security';

export function createApp(
  dashboard: DashboardService = dashboardService,
  sessions: SessionContextService = sessionContextService
) {
  const app = express();
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    secureLog('Request', { method: req.method, path: req.path, ip: req.ip }, 'debug');
    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      cache: dashboard.cacheStats(),
    });
  });

  app.get('/options', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await dashboard.getSnapshot();
      res.json({
        success: true,
        data: {
          ...dashboard.filterOptions(snapshot),
          dateColumn: snapshot.dateColumn,
          issues: snapshot.issues,
          loadedAt: snapshot.loadedAt.toISOString(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/activity/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(req.body);
      const filters = parseActivityFilters(body);
      const limit = parseLimit(body.limit, config.query.resultLimit);
      const snapshot = await dashboard.getSnapshot();

      res.json({ success: true, data: dashboard.queryActivity(snapshot, filters, limit) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/accounts/top', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(req.body);
      const filters = parseActivityFilters(body);
      const limit = parseLimit(body.limit, config.query.topAccounts);
      const snapshot = await dashboard.getSnapshot();

      res.json({ success: true, data: dashboard.topAccounts(snapshot, filters, limit) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/accounts/:account/timeline', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await dashboard.getSnapshot();
      res.json({ success: true, data: dashboard.accountTimeline(snapshot, req.params.account) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/accounts/:account/firmographics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await dashboard.getSnapshot();
      res.json({ success: true, data: dashboard.firmographicsPanel(snapshot, req.params.account) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/accounts/:account/contacts', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseContactFilters(req.body);
      const snapshot = await dashboard.getSnapshot();

      res.json({ success: true, data: dashboard.contactCards(snapshot, req.params.account, filters) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const context = sessions.get(req.params.sessionId);
      const snapshot = await dashboard.getSnapshot();

      res.json({ success: true, data: { context, view: dashboard.render(snapshot, context) } });
    } catch (error) {
      next(error);
    }
  });

  app.put('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(req.body);
      if (body.account !== undefined && body.account !== null && typeof body.account !== 'string') {
        throw new ValidationError('"account" must be a string or null', { field: 'account' });
      }

      const context = sessions.update(req.params.sessionId, {
        account: typeof body.account === 'string' ? body.account : body.account === null ? null : undefined,
        activity: body.activity !== undefined ? parseActivityFilters(body.activity) : undefined,
        contacts: body.contacts !== undefined ? parseContactFilters(body.contacts) : undefined,
      });
      const snapshot = await dashboard.getSnapshot();

      res.json({ success: true, data: { context, view: dashboard.render(snapshot, context) } });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/sessions/:sessionId', (req: Request, res: Response) => {
    const cleared = sessions.clear(req.params.sessionId);
    res.json({ success: true, cleared });
  });

  app.post('/sources/reload', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await dashboard.reload();
      res.json({
        success: true,
        data: {
          activityRows: snapshot.activity.rows.length,
          firmographicRows: snapshot.firmographics.rows.length,
          contactRows: snapshot.contacts.rows.length,
          issues: snapshot.issues,
          loadedAt: snapshot.loadedAt.toISOString(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
    secureLog(error.message || 'An error occurred', {
      code: error instanceof DashboardError ? error.code : 'INTERNAL_ERROR',
      stack: error.stack,
      path: req.path,
    }, 'error');

    if (error instanceof DashboardError) {
      res.status(error.statusCode).json({
        success: false,
        message: error.message,
        error: {
          message: error.message,
          code: error.code,
          details: error.details,
        },
      });
    } else {
      res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: {
          message: 'Internal server error',
          code: 'INTERNAL_ERROR',
        },
      });
    }
  });

  return app;
}

const app = createApp();

async function startServer() {
  // Fail fast on unreachable sources
  await dashboardService.getSnapshot();

  app.listen(config.server.port, () => {
    logger.info('Engagement explorer started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });
}

if (require.main === module) {
  startServer().catch((error: Error) => {
    secureLog('Failed to start server', { error: error.message }, 'error');
    process.exit(1);
  });
}

export { app, startServer };
