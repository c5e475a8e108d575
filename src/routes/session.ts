import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import type { ActivityTrackingService } from '../services/activityTracking';
import type { SessionLifecycleService } from '../services/sessionLifecycle';
import type { SessionSummaryService } from '../services/sessionSummary';
import {
  activitySchema,
  endSessionSchema,
  startSessionSchema,
  summaryParamsSchema,
} from '../validators/session';

export interface SessionRouteServices {
  lifecycle: SessionLifecycleService;
  activity: ActivityTrackingService;
  summary: SessionSummaryService;
}

export default function sessionRoutes(services: SessionRouteServices): Router {
  const router: Router = express.Router();

  // POST /api/session/start
  router.post('/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = startSessionSchema.parse(req.body);
      const result = await services.lifecycle.start({
        userId: body.user_id,
        goal: body.goal,
        durationMinutes: body.duration_minutes,
        categories: body.categories,
        voice: body.voice,
      });
      res.json({ session_id: result.sessionId, status: result.status });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/session/activity
  router.post('/activity', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = activitySchema.parse(req.body);
      const { decision, reason } = await services.activity.recordActivity({
        sessionId: body.session_id,
        userId: body.user_id,
        app: body.app,
        url: body.url,
        title: body.title,
        idle: body.idle,
        device: body.device,
      });
      res.json({ decision, reason });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/session/end
  router.post('/end', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = endSessionSchema.parse(req.body);
      const result = await services.lifecycle.end(body.session_id);
      res.json({ status: result.status });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/session/:user_id/summary
  router.get('/:user_id/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = summaryParamsSchema.parse(req.params);
      const summary = await services.summary.summarize(params.user_id);
      res.json({
        sessions: summary.sessionCount,
        total_focus_seconds: summary.totalFocusSeconds,
        total_idle_seconds: summary.totalIdleSeconds,
        distractions_blocked: summary.distractionsBlocked,
        streak_days: summary.streakDays,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
