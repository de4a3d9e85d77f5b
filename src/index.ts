import 'dotenv/config';
import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { ApiError } from './api/errors';
import { getBudgetOverview, getSpend } from './api/budget/overview';
import { clearCategoryLimit, clearOverallLimit, setCategoryLimit, setOverallLimit } from './api/budget/limits';
import { setCategoryWindow, setCategoryWindowEnd, setOverallWindow, setOverallWindowEnd } from './api/budget/windows';
import { evaluateThreshold, observeBudget, recordCompletion } from './api/budget/evaluations';
import { getMedalBreakdown, getMedals, restartMedalCycle } from './api/budget/medals';
import { pruneBudgetFlags } from './api/budget/flags';
import { createBudgetServices, setBudgetServices } from './api/budget/services';
import { loadConfig } from './utils/config';
import { PersistenceError } from './utils/io/errors';
import { err, log, logToFile } from './utils/log';

type Handler<T> = (req: Request) => T | Promise<T>;

/**
 * Sends the handler's result as JSON and forwards anything it throws to the error middleware
 */
function respond<T>(handler: Handler<T>) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await handler(req));
    } catch (error) {
      next(error);
    }
  };
}

export function statusFor(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof PersistenceError) {
    return 503;
  }
  return 500;
}

export const app: Express = express();

// Middleware
app.use(express.json());
app.use(bodyParser.urlencoded({ extended: true }));

// Budget routes
app.get('/api/budget/:accountId', respond(getBudgetOverview));
app.get('/api/budget/:accountId/spend', respond(getSpend));

app
  .route('/api/budget/:accountId/limit')
  .put(respond(setOverallLimit))
  .delete(respond(clearOverallLimit));

app.put('/api/budget/:accountId/window', respond(setOverallWindow));
app.put('/api/budget/:accountId/window/end', respond(setOverallWindowEnd));

// Category routes
app
  .route('/api/budget/:accountId/categories/:categoryName/limit')
  .put(respond(setCategoryLimit))
  .delete(respond(clearCategoryLimit));

app.put('/api/budget/:accountId/categories/:categoryName/window', respond(setCategoryWindow));
app.put('/api/budget/:accountId/categories/:categoryName/window/end', respond(setCategoryWindowEnd));

// Notification and completion routes
app.post('/api/budget/:accountId/evaluate', respond(evaluateThreshold));
app.post('/api/budget/:accountId/completions', respond(recordCompletion));
app.post('/api/budget/:accountId/observe', respond(observeBudget));
app.post('/api/budget/:accountId/flags/prune', respond(pruneBudgetFlags));

// Medal routes
app.get('/api/budget/:accountId/medals', respond(getMedals));
app.get('/api/budget/:accountId/medals/breakdown', respond(getMedalBreakdown));
app.post('/api/budget/:accountId/medals/restart', respond(restartMedalCycle));

app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const status = statusFor(error);
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (status >= 500) {
    err('Request failed', `${req.method} ${req.path}`, error);
  }
  res.status(status).json({ error: message });
});

// Start server
if (require.main === module) {
  const config = loadConfig();
  logToFile('', true);
  setBudgetServices(createBudgetServices(config));
  app.listen(config.port, () => {
    log(`Server is running on port ${config.port}`, { dataDir: config.dataDir });
  });
}
