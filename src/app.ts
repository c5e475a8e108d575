import express, { type Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from './config/env';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import sessionRoutes from './routes/session';
import statusRoutes from './routes/status';
import userRoutes from './routes/user';
import { ActivityTrackingService } from './services/activityTracking';
import { SessionAccrualService } from './services/sessionAccrual';
import { SessionLifecycleService } from './services/sessionLifecycle';
import { SessionSummaryService } from './services/sessionSummary';
import { UserRegistryService } from './services/userRegistry';
import type { FocusStore } from './store/focusStore';
import { logger, type Logger } from './utils/logger';

export interface AppDependencies {
  config: AppConfig;
  store: FocusStore;
  log?: Logger;
}

export function createApp({ config, store, log = logger }: AppDependencies): Application {
  const app: Application = express();

  const accrual = new SessionAccrualService(store);
  const lifecycle = new SessionLifecycleService(store, log);
  const activity = new ActivityTrackingService(store, accrual, {
    rejectEndedSessions: config.rejectEndedSessionActivity,
    log,
  });
  const summary = new SessionSummaryService(store);
  const users = new UserRegistryService(store);

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
    })
  );
  app.use(requestLogger(log));

  // Routes
  app.use('/', statusRoutes(store, config));
  app.use('/api/user', userRoutes(users));
  app.use('/api/session', sessionRoutes({ lifecycle, activity, summary }));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ verbose: config.env !== 'production', log }));

  return app;
}
