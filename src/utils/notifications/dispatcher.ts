import { BudgetNotice } from '../../data/budget/types';
import { checkExists, load, save } from '../io/io';
import { withPersistence } from '../io/errors';
import { log, warn } from '../log';

/**
 * Delivers budget notices to the user. Delivery and permission handling live behind this interface.
 */
export interface NotificationDispatcher {
  dispatch(notice: BudgetNotice): Promise<void>;
}

export type DispatchReport = {
  delivered: string[];
  failed: { id: string; error: string }[];
};

export const OUTBOX_FILE_NAME = 'notification-outbox.json';

export type OutboxEntry = Omit<BudgetNotice, 'createdAt'> & { createdAt: string };

/**
 * Appends notices to a JSON outbox in the data directory for a delivery worker to send
 */
export class OutboxDispatcher implements NotificationDispatcher {
  constructor(private readonly fileName: string = OUTBOX_FILE_NAME) {}

  async dispatch(notice: BudgetNotice): Promise<void> {
    withPersistence(`Appending to ${this.fileName}`, () => {
      const outbox = checkExists(this.fileName) ? load<OutboxEntry[]>(this.fileName) : [];
      outbox.push({ ...notice, createdAt: notice.createdAt.toISOString() });
      save<OutboxEntry[]>(outbox, this.fileName);
    });
    log('Notice queued', notice.title, { id: notice.id, accountId: notice.accountId, threshold: notice.threshold });
  }
}

/**
 * Dispatches notices one at a time, in order. A failed notice does not stop the rest;
 * its threshold stays claimed, so it is reported rather than retried.
 */
export async function dispatchAll(dispatcher: NotificationDispatcher, notices: BudgetNotice[]): Promise<DispatchReport> {
  const report: DispatchReport = { delivered: [], failed: [] };
  for (const notice of notices) {
    try {
      await dispatcher.dispatch(notice);
      report.delivered.push(notice.id);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warn('Notice dispatch failed', { id: notice.id, error: message });
      report.failed.push({ id: notice.id, error: message });
    }
  }
  return report;
}
