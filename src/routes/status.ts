import express, { type Request, type Response, type Router } from 'express';
import type { AppConfig } from '../config/env';
import type { FocusStore } from '../store/focusStore';
import type { StoreDiagnostics } from '../types';

const ERROR_PREVIEW_LENGTH = 50;

export interface DiagnosticsResponse {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

export function describeDatabase(diagnostics: StoreDiagnostics): string {
  if (diagnostics.connected) {
    return diagnostics.error
      ? `Connected but Error: ${diagnostics.error}`
      : 'Connected & Working';
  }
  return diagnostics.error ? `Error: ${diagnostics.error}` : 'Not Available';
}

export default function statusRoutes(store: FocusStore, config: AppConfig): Router {
  const router: Router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Focus tracker backend running' });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      node: process.version,
      env: config.env,
      time: new Date().toISOString(),
    });
  });

  // Store failures are reported in the body, never as an error status.
  router.get('/test', async (_req: Request, res: Response) => {
    let diagnostics: StoreDiagnostics;
    try {
      diagnostics = await store.diagnose();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      diagnostics = {
        connected: false,
        databaseName: null,
        collections: [],
        error: message.slice(0, ERROR_PREVIEW_LENGTH),
      };
    }

    const body: DiagnosticsResponse = {
      backend: 'Running',
      database: describeDatabase(diagnostics),
      database_url: config.database.url ? 'Set' : 'Not Set',
      database_name: config.database.name ? 'Set' : 'Not Set',
      connection_status: diagnostics.connected ? 'Connected' : 'Not Connected',
      collections: diagnostics.collections,
    };
    res.json(body);
  });

  return router;
}
