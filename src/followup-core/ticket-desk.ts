// src/followup-core/ticket-desk.ts
// Caseworker-driven ticket actions. Not covered by the auto-ticket key.

import { BENEFICIARY_DASHBOARD_LINK } from '@shared/constants';
import { NotFoundError } from './errors';
import { notificationText } from './messages';
import { authorize, authorizeOnCase } from './permissions';
import type { CaseStore } from './store';
import type { EngineContext, TicketRecord } from './types';
import { manualTicketSchema, parseInput, ticketStatusSchema } from './validation';

export async function openManualTicket(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
  input: unknown,
): Promise<TicketRecord> {
  authorize(ctx.actor, 'open_ticket');
  const data = parseInput(manualTicketSchema, input);

  return store.withCaseLock(caseId, async (tx) => {
    const caseRecord = await tx.getCase(caseId);
    if (!caseRecord) throw new NotFoundError('Case', caseId);

    const ticket = await tx.createTicket({
      caseId,
      category: data.category,
      notes: data.notes,
      createdById: ctx.actor.personId,
    });
    await tx.createNotification(
      caseRecord.personId,
      notificationText.ticketOpened(ticket.category),
      BENEFICIARY_DASHBOARD_LINK,
    );
    return ticket;
  });
}

/**
 * Moves a ticket to any status of the enumeration and tells the beneficiary.
 */
export async function changeTicketStatus(
  store: CaseStore,
  ctx: EngineContext,
  ticketId: string,
  input: unknown,
): Promise<TicketRecord> {
  authorize(ctx.actor, 'change_ticket_status');
  const { status } = parseInput(ticketStatusSchema, input);

  const ticket = await store.getTicket(ticketId);
  if (!ticket) throw new NotFoundError('Ticket', ticketId);

  return store.withCaseLock(ticket.caseId, async (tx) => {
    const current = await tx.getTicket(ticketId);
    if (!current) throw new NotFoundError('Ticket', ticketId);
    const caseRecord = await tx.getCase(current.caseId);
    if (!caseRecord) throw new NotFoundError('Case', current.caseId);

    const saved = await tx.saveTicket({ ...current, status });
    await tx.createNotification(
      caseRecord.personId,
      notificationText.ticketStatusChanged(status),
      BENEFICIARY_DASHBOARD_LINK,
    );
    return saved;
  });
}

export async function listCaseTickets(
  store: CaseStore,
  ctx: EngineContext,
  caseId: string,
  activeOnly = false,
): Promise<TicketRecord[]> {
  const caseRecord = await store.getCase(caseId);
  if (!caseRecord) throw new NotFoundError('Case', caseId);
  authorizeOnCase(ctx.actor, 'view_case', caseRecord);
  return store.listTickets(caseId, activeOnly ? ['open', 'in_progress'] : undefined);
}
