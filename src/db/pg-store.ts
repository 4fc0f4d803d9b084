import { and, desc, asc, eq, inArray, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { DatabaseError } from 'pg';
import {
  ConcurrencyConflictError,
  DownstreamUnavailableError,
  EngineError,
  NotFoundError,
  ValidationError,
} from '@core/errors';
import type {
  AutoTicketKey,
  CaseFilter,
  CaseStore,
  FindOrCreateResult,
  NewCase,
  NewPerson,
  NewTicket,
  NotificationQuery,
} from '@core/store';
import type {
  CaseRecord,
  JobOpportunityRecord,
  NotificationRecord,
  PersonRecord,
  ReportFields,
  ReportRecord,
  TicketRecord,
  TicketStatus,
} from '@core/types';
import { isRecordId } from '@core/validation';
import * as schema from './schema';
import {
  cases,
  jobOpportunities,
  notifications,
  openAutoTicketPredicate,
  persons,
  reports,
  tickets,
} from './schema';

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

// serialization_failure, deadlock_detected, unique_violation
const CONFLICT_CODES = new Set(['40001', '40P01', '23505']);

const INVALID_TEXT_REPRESENTATION = '22P02';

const CONNECTION_CODES = new Set([
  // admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
]);

function errorCode(err: unknown): string | null {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/**
 * Maps driver failures onto the engine's error taxonomy. Engine errors
 * raised inside a unit of work pass through untouched.
 */
export function translateError(err: unknown): unknown {
  if (err instanceof EngineError) return err;

  const code = errorCode(err);
  if (code === INVALID_TEXT_REPRESENTATION) {
    return new ValidationError(`Malformed value: ${err instanceof Error ? err.message : code}`);
  }
  if (code && CONFLICT_CODES.has(code)) {
    return new ConcurrencyConflictError(`Concurrent update rejected (${code})`, { cause: err });
  }
  if (code && CONNECTION_CODES.has(code)) {
    return new DownstreamUnavailableError(`Database unavailable (${code})`, { cause: err });
  }
  if (err instanceof DatabaseError) {
    return new DownstreamUnavailableError(`Database error: ${err.message}`, { cause: err });
  }
  return err;
}

/**
 * CaseStore on Postgres. A store created by `withCaseLock` is bound to the
 * transaction holding the case row lock.
 */
export class PgCaseStore implements CaseStore {
  constructor(
    private readonly db: Executor,
    private readonly lockedCaseId: string | null = null,
  ) {}

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw translateError(err);
    }
  }

  // --- Persons ---

  getPerson(id: string): Promise<PersonRecord | null> {
    return this.run(async () => {
      if (!isRecordId(id)) return null;
      const [row] = await this.db.select().from(persons).where(eq(persons.id, id));
      return row ?? null;
    });
  }

  getPersonByNationalId(nationalId: string): Promise<PersonRecord | null> {
    return this.run(async () => {
      const [row] = await this.db
        .select()
        .from(persons)
        .where(eq(persons.nationalId, nationalId));
      return row ?? null;
    });
  }

  createPerson(input: NewPerson): Promise<PersonRecord> {
    return this.run(async () => {
      const [row] = await this.db.insert(persons).values(input).returning();
      return row;
    });
  }

  deletePerson(id: string): Promise<boolean> {
    return this.run(async () => {
      if (!isRecordId(id)) return false;
      const rows = await this.db
        .delete(persons)
        .where(eq(persons.id, id))
        .returning({ id: persons.id });
      return rows.length > 0;
    });
  }

  // --- Cases ---

  getCase(id: string): Promise<CaseRecord | null> {
    return this.run(async () => {
      if (!isRecordId(id)) return null;
      const [row] = await this.db.select().from(cases).where(eq(cases.id, id));
      return row ?? null;
    });
  }

  getCaseByPerson(personId: string): Promise<CaseRecord | null> {
    return this.run(async () => {
      if (!isRecordId(personId)) return null;
      const [row] = await this.db.select().from(cases).where(eq(cases.personId, personId));
      return row ?? null;
    });
  }

  listCases(filter: CaseFilter = {}): Promise<CaseRecord[]> {
    return this.run(async () => {
      const conditions: SQL[] = [];
      if (filter.riskTier) conditions.push(eq(cases.riskTier, filter.riskTier));
      if (filter.city) conditions.push(eq(cases.city, filter.city));
      if (filter.completed !== undefined) conditions.push(eq(cases.completed, filter.completed));
      if (filter.assignedCaseWorkerId) {
        conditions.push(eq(cases.assignedCaseWorkerId, filter.assignedCaseWorkerId));
      }
      return await this.db
        .select()
        .from(cases)
        .where(and(...conditions))
        .orderBy(desc(cases.createdAt));
    });
  }

  createCase(input: NewCase): Promise<CaseRecord> {
    return this.run(async () => {
      const [row] = await this.db.insert(cases).values(input).returning();
      return row;
    });
  }

  saveCase(record: CaseRecord): Promise<CaseRecord> {
    return this.run(async () => {
      const [row] = await this.db
        .update(cases)
        .set({
          riskTier: record.riskTier,
          city: record.city,
          notes: record.notes,
          assignedCaseWorkerId: record.assignedCaseWorkerId,
          // completion is one-way
          ...(record.completed ? { completed: true } : {}),
          updatedAt: new Date(),
        })
        .where(eq(cases.id, record.id))
        .returning();
      if (!row) throw new NotFoundError('Case', record.id);
      return row;
    });
  }

  // --- Reports ---

  upsertReport(caseId: string, monthIndex: number, fields: ReportFields): Promise<ReportRecord> {
    return this.run(async () => {
      const submittedAt = new Date();
      const [row] = await this.db
        .insert(reports)
        .values({ caseId, monthIndex, ...fields, submittedAt })
        .onConflictDoUpdate({
          target: [reports.caseId, reports.monthIndex],
          set: { ...fields, submittedAt },
        })
        .returning();
      return row;
    });
  }

  latestReport(caseId: string): Promise<ReportRecord | null> {
    return this.run(async () => {
      const [row] = await this.db
        .select()
        .from(reports)
        .where(eq(reports.caseId, caseId))
        .orderBy(desc(reports.submittedAt), desc(reports.monthIndex))
        .limit(1);
      return row ?? null;
    });
  }

  listReports(caseId: string): Promise<ReportRecord[]> {
    return this.run(async () =>
      await this.db
        .select()
        .from(reports)
        .where(eq(reports.caseId, caseId))
        .orderBy(asc(reports.monthIndex)),
    );
  }

  // --- Tickets ---

  /**
   * Insert-or-ignore against the partial unique index on open auto-tickets,
   * then read back the ticket that won.
   */
  findOrCreateTicket(
    key: AutoTicketKey,
    defaults: { notes: string },
  ): Promise<FindOrCreateResult<TicketRecord>> {
    return this.run(async () => {
      const [inserted] = await this.db
        .insert(tickets)
        .values({
          caseId: key.caseId,
          category: key.category,
          status: key.status,
          autoGenerated: key.autoGenerated,
          notes: defaults.notes,
        })
        .onConflictDoNothing({
          target: [tickets.caseId, tickets.category],
          where: openAutoTicketPredicate,
        })
        .returning();
      if (inserted) return { record: inserted, created: true };

      const [existing] = await this.db
        .select()
        .from(tickets)
        .where(
          and(
            eq(tickets.caseId, key.caseId),
            eq(tickets.category, key.category),
            eq(tickets.status, key.status),
            eq(tickets.autoGenerated, key.autoGenerated),
          ),
        )
        .limit(1);
      if (!existing) {
        throw new ConcurrencyConflictError(
          `Open ${key.category} ticket of case ${key.caseId} changed during creation`,
        );
      }
      return { record: existing, created: false };
    });
  }

  createTicket(input: NewTicket): Promise<TicketRecord> {
    return this.run(async () => {
      const [row] = await this.db
        .insert(tickets)
        .values({ ...input, status: 'open', autoGenerated: false })
        .returning();
      return row;
    });
  }

  getTicket(id: string): Promise<TicketRecord | null> {
    return this.run(async () => {
      if (!isRecordId(id)) return null;
      const [row] = await this.db.select().from(tickets).where(eq(tickets.id, id));
      return row ?? null;
    });
  }

  saveTicket(record: TicketRecord): Promise<TicketRecord> {
    return this.run(async () => {
      const [row] = await this.db
        .update(tickets)
        .set({ status: record.status, notes: record.notes, updatedAt: new Date() })
        .where(eq(tickets.id, record.id))
        .returning();
      if (!row) throw new NotFoundError('Ticket', record.id);
      return row;
    });
  }

  listTickets(caseId: string, statuses?: readonly TicketStatus[]): Promise<TicketRecord[]> {
    return this.run(async () => {
      const byCase = eq(tickets.caseId, caseId);
      return await this.db
        .select()
        .from(tickets)
        .where(statuses ? and(byCase, inArray(tickets.status, [...statuses])) : byCase)
        .orderBy(desc(tickets.createdAt));
    });
  }

  // --- Notifications ---

  createNotification(recipientId: string, message: string, link: string): Promise<NotificationRecord> {
    return this.run(async () => {
      const [row] = await this.db
        .insert(notifications)
        .values({ recipientId, message, link })
        .returning();
      return row;
    });
  }

  getNotification(id: string): Promise<NotificationRecord | null> {
    return this.run(async () => {
      if (!isRecordId(id)) return null;
      const [row] = await this.db.select().from(notifications).where(eq(notifications.id, id));
      return row ?? null;
    });
  }

  saveNotification(record: NotificationRecord): Promise<NotificationRecord> {
    return this.run(async () => {
      // read is the only mutable field and never goes back to false
      const [row] = record.read
        ? await this.db
            .update(notifications)
            .set({ read: true })
            .where(eq(notifications.id, record.id))
            .returning()
        : await this.db.select().from(notifications).where(eq(notifications.id, record.id));
      if (!row) throw new NotFoundError('Notification', record.id);
      return row;
    });
  }

  listNotifications(recipientId: string, query: NotificationQuery = {}): Promise<NotificationRecord[]> {
    return this.run(async () => {
      const byRecipient = eq(notifications.recipientId, recipientId);
      let q = this.db
        .select()
        .from(notifications)
        .where(query.unreadOnly ? and(byRecipient, eq(notifications.read, false)) : byRecipient)
        .orderBy(desc(notifications.createdAt))
        .$dynamic();
      if (query.limit !== undefined) q = q.limit(query.limit);
      return await q;
    });
  }

  // --- Jobs ---

  listJobs(activeOnly = true): Promise<JobOpportunityRecord[]> {
    return this.run(async () =>
      await this.db
        .select()
        .from(jobOpportunities)
        .where(activeOnly ? eq(jobOpportunities.active, true) : undefined)
        .orderBy(desc(jobOpportunities.createdAt)),
    );
  }

  // --- Unit of work ---

  withCaseLock<T>(caseId: string, work: (store: CaseStore) => Promise<T>): Promise<T> {
    if (this.lockedCaseId === caseId) return work(this);

    return this.run(() =>
      this.db.transaction(async (tx) => {
        const [row] = await tx
          .select({ id: cases.id })
          .from(cases)
          .where(eq(cases.id, caseId))
          .for('update');
        if (!row) throw new NotFoundError('Case', caseId);
        return work(new PgCaseStore(tx, caseId));
      }),
    );
  }
}
