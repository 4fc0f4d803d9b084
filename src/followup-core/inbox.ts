import { caseWorkerCaseLink } from '@shared/constants';
import { ForbiddenError, NotFoundError } from './errors';
import { notificationText } from './messages';
import { authorizeOnCase } from './permissions';
import type { CaseStore, NotificationQuery } from './store';
import type { EngineContext, NotificationRecord } from './types';
import { messageSchema, notificationQuerySchema, parseInput } from './validation';

export async function listInbox(
  store: CaseStore,
  ctx: EngineContext,
  query: NotificationQuery = {},
): Promise<NotificationRecord[]> {
  return store.listNotifications(ctx.actor.personId, parseInput(notificationQuerySchema, query));
}

/** Only the recipient may mark a notification; read is terminal. */
export async function markNotificationRead(
  store: CaseStore,
  ctx: EngineContext,
  notificationId: string,
): Promise<NotificationRecord> {
  const notification = await store.getNotification(notificationId);
  if (!notification) throw new NotFoundError('Notification', notificationId);
  if (notification.recipientId !== ctx.actor.personId) {
    throw new ForbiddenError('Notification belongs to another person');
  }
  if (notification.read) return notification;
  return store.saveNotification({ ...notification, read: true });
}

/**
 * Forwards a beneficiary's message to their caseworker as a notification.
 * Returns null when the case has no caseworker assigned.
 */
export async function messageCaseWorker(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
  input: unknown,
): Promise<NotificationRecord | null> {
  const { content } = parseInput(messageSchema, input);

  const caseRecord = await store.getCase(caseId);
  if (!caseRecord) throw new NotFoundError('Case', caseId);
  authorizeOnCase(ctx.actor, 'message_case_worker', caseRecord);
  if (!caseRecord.assignedCaseWorkerId) return null;

  const sender = await store.getPerson(caseRecord.personId);
  if (!sender) throw new NotFoundError('Person', caseRecord.personId);

  return store.createNotification(
    caseRecord.assignedCaseWorkerId,
    notificationText.messageFromBeneficiary(sender.fullName, content),
    caseWorkerCaseLink(caseRecord.id),
  );
}
