import { randomUUID } from 'crypto';
import { NotFoundError, ValidationError } from '@core/errors';
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

export interface MemoryState {
  persons: Map<string, PersonRecord>;
  cases: Map<string, CaseRecord>;
  reports: Map<string, ReportRecord>;
  tickets: Map<string, TicketRecord>;
  notifications: Map<string, NotificationRecord>;
  jobs: Map<string, JobOpportunityRecord>;
  /** Submission order of reports; breaks ties between equal timestamps. */
  submissionSeq: Map<string, number>;
  locks: Map<string, Promise<void>>;
  seq: number;
}

export function createMemoryState(): MemoryState {
  return {
    persons: new Map(),
    cases: new Map(),
    reports: new Map(),
    tickets: new Map(),
    notifications: new Map(),
    jobs: new Map(),
    submissionSeq: new Map(),
    locks: new Map(),
    seq: 0,
  };
}

interface CaseSnapshot {
  caseRecord: CaseRecord | undefined;
  reports: { record: ReportRecord; seq: number | undefined }[];
  tickets: TicketRecord[];
}

function byNewest<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/**
 * In-process CaseStore. Records are copied in and out, so callers never hold
 * live references. `withCaseLock` chains work per case and, when the work
 * fails, restores the case's records and drops the notifications it created.
 */
export class MemoryCaseStore implements CaseStore {
  private readonly createdNotificationIds: string[] = [];

  constructor(
    private readonly state: MemoryState = createMemoryState(),
    private readonly lockedCaseId: string | null = null,
  ) {}

  // --- Persons ---

  async getPerson(id: string): Promise<PersonRecord | null> {
    const row = this.state.persons.get(id);
    return row ? { ...row } : null;
  }

  async getPersonByNationalId(nationalId: string): Promise<PersonRecord | null> {
    for (const row of this.state.persons.values()) {
      if (row.nationalId === nationalId) return { ...row };
    }
    return null;
  }

  async createPerson(input: NewPerson): Promise<PersonRecord> {
    if (await this.getPersonByNationalId(input.nationalId)) {
      throw new ValidationError(`National ID ${input.nationalId} is already registered`);
    }
    const row: PersonRecord = { id: randomUUID(), ...input, createdAt: new Date() };
    this.state.persons.set(row.id, row);
    return { ...row };
  }

  async deletePerson(id: string): Promise<boolean> {
    const { state } = this;
    if (!state.persons.delete(id)) return false;

    for (const c of [...state.cases.values()]) {
      if (c.personId === id) {
        this.dropCase(c.id);
      } else if (c.assignedCaseWorkerId === id) {
        state.cases.set(c.id, { ...c, assignedCaseWorkerId: null });
      }
    }
    for (const t of state.tickets.values()) {
      if (t.createdById === id) state.tickets.set(t.id, { ...t, createdById: null });
    }
    for (const n of [...state.notifications.values()]) {
      if (n.recipientId === id) state.notifications.delete(n.id);
    }
    return true;
  }

  private dropCase(caseId: string): void {
    const { state } = this;
    state.cases.delete(caseId);
    for (const r of [...state.reports.values()]) {
      if (r.caseId === caseId) {
        state.reports.delete(r.id);
        state.submissionSeq.delete(r.id);
      }
    }
    for (const t of [...state.tickets.values()]) {
      if (t.caseId === caseId) state.tickets.delete(t.id);
    }
  }

  // --- Cases ---

  async getCase(id: string): Promise<CaseRecord | null> {
    const row = this.state.cases.get(id);
    return row ? { ...row } : null;
  }

  async getCaseByPerson(personId: string): Promise<CaseRecord | null> {
    for (const row of this.state.cases.values()) {
      if (row.personId === personId) return { ...row };
    }
    return null;
  }

  async listCases(filter: CaseFilter = {}): Promise<CaseRecord[]> {
    return [...this.state.cases.values()]
      .filter(
        (c) =>
          (filter.riskTier === undefined || c.riskTier === filter.riskTier) &&
          (filter.city === undefined || c.city === filter.city) &&
          (filter.completed === undefined || c.completed === filter.completed) &&
          (filter.assignedCaseWorkerId === undefined ||
            c.assignedCaseWorkerId === filter.assignedCaseWorkerId),
      )
      .sort(byNewest)
      .map((c) => ({ ...c }));
  }

  async createCase(input: NewCase): Promise<CaseRecord> {
    if (await this.getCaseByPerson(input.personId)) {
      throw new ValidationError(`Person ${input.personId} already has a case`);
    }
    const now = new Date();
    const row: CaseRecord = {
      id: randomUUID(),
      ...input,
      riskTier: 'green',
      completed: false,
      createdAt: now,
      updatedAt: now,
    };
    this.state.cases.set(row.id, row);
    return { ...row };
  }

  async saveCase(record: CaseRecord): Promise<CaseRecord> {
    const current = this.state.cases.get(record.id);
    if (!current) throw new NotFoundError('Case', record.id);
    const row: CaseRecord = {
      ...current,
      riskTier: record.riskTier,
      city: record.city,
      notes: record.notes,
      assignedCaseWorkerId: record.assignedCaseWorkerId,
      completed: current.completed || record.completed,
      updatedAt: new Date(),
    };
    this.state.cases.set(row.id, row);
    return { ...row };
  }

  // --- Reports ---

  async upsertReport(caseId: string, monthIndex: number, fields: ReportFields): Promise<ReportRecord> {
    const { state } = this;
    if (!state.cases.has(caseId)) throw new NotFoundError('Case', caseId);

    const now = new Date();
    const existing = [...state.reports.values()].find(
      (r) => r.caseId === caseId && r.monthIndex === monthIndex,
    );
    const row: ReportRecord = existing
      ? { ...existing, ...fields, submittedAt: now }
      : { id: randomUUID(), caseId, monthIndex, ...fields, createdAt: now, submittedAt: now };

    state.reports.set(row.id, row);
    state.submissionSeq.set(row.id, ++state.seq);
    return { ...row };
  }

  async latestReport(caseId: string): Promise<ReportRecord | null> {
    const { submissionSeq } = this.state;
    let latest: ReportRecord | null = null;
    for (const r of this.state.reports.values()) {
      if (r.caseId !== caseId) continue;
      if (
        !latest ||
        r.submittedAt.getTime() > latest.submittedAt.getTime() ||
        (r.submittedAt.getTime() === latest.submittedAt.getTime() &&
          (submissionSeq.get(r.id) ?? 0) > (submissionSeq.get(latest.id) ?? 0))
      ) {
        latest = r;
      }
    }
    return latest ? { ...latest } : null;
  }

  async listReports(caseId: string): Promise<ReportRecord[]> {
    return [...this.state.reports.values()]
      .filter((r) => r.caseId === caseId)
      .sort((a, b) => a.monthIndex - b.monthIndex)
      .map((r) => ({ ...r }));
  }

  // --- Tickets ---

  async findOrCreateTicket(
    key: AutoTicketKey,
    defaults: { notes: string },
  ): Promise<FindOrCreateResult<TicketRecord>> {
    if (!this.state.cases.has(key.caseId)) throw new NotFoundError('Case', key.caseId);

    for (const t of this.state.tickets.values()) {
      if (
        t.caseId === key.caseId &&
        t.category === key.category &&
        t.status === key.status &&
        t.autoGenerated === key.autoGenerated
      ) {
        return { record: { ...t }, created: false };
      }
    }
    const now = new Date();
    const row: TicketRecord = {
      id: randomUUID(),
      caseId: key.caseId,
      category: key.category,
      status: key.status,
      notes: defaults.notes,
      autoGenerated: key.autoGenerated,
      createdById: null,
      createdAt: now,
      updatedAt: now,
    };
    this.state.tickets.set(row.id, row);
    return { record: { ...row }, created: true };
  }

  async createTicket(input: NewTicket): Promise<TicketRecord> {
    if (!this.state.cases.has(input.caseId)) throw new NotFoundError('Case', input.caseId);
    const now = new Date();
    const row: TicketRecord = {
      id: randomUUID(),
      ...input,
      status: 'open',
      autoGenerated: false,
      createdAt: now,
      updatedAt: now,
    };
    this.state.tickets.set(row.id, row);
    return { ...row };
  }

  async getTicket(id: string): Promise<TicketRecord | null> {
    const row = this.state.tickets.get(id);
    return row ? { ...row } : null;
  }

  async saveTicket(record: TicketRecord): Promise<TicketRecord> {
    const current = this.state.tickets.get(record.id);
    if (!current) throw new NotFoundError('Ticket', record.id);
    const row: TicketRecord = {
      ...current,
      status: record.status,
      notes: record.notes,
      updatedAt: new Date(),
    };
    this.state.tickets.set(row.id, row);
    return { ...row };
  }

  async listTickets(caseId: string, statuses?: readonly TicketStatus[]): Promise<TicketRecord[]> {
    return [...this.state.tickets.values()]
      .filter((t) => t.caseId === caseId && (!statuses || statuses.includes(t.status)))
      .sort(byNewest)
      .map((t) => ({ ...t }));
  }

  // --- Notifications ---

  async createNotification(
    recipientId: string,
    message: string,
    link: string,
  ): Promise<NotificationRecord> {
    if (!this.state.persons.has(recipientId)) throw new NotFoundError('Person', recipientId);
    const row: NotificationRecord = {
      id: randomUUID(),
      recipientId,
      message,
      link,
      read: false,
      createdAt: new Date(),
    };
    this.state.notifications.set(row.id, row);
    if (this.lockedCaseId !== null) this.createdNotificationIds.push(row.id);
    return { ...row };
  }

  async getNotification(id: string): Promise<NotificationRecord | null> {
    const row = this.state.notifications.get(id);
    return row ? { ...row } : null;
  }

  async saveNotification(record: NotificationRecord): Promise<NotificationRecord> {
    const current = this.state.notifications.get(record.id);
    if (!current) throw new NotFoundError('Notification', record.id);
    const row: NotificationRecord = { ...current, read: current.read || record.read };
    this.state.notifications.set(row.id, row);
    return { ...row };
  }

  async listNotifications(
    recipientId: string,
    query: NotificationQuery = {},
  ): Promise<NotificationRecord[]> {
    const rows = [...this.state.notifications.values()]
      .filter((n) => n.recipientId === recipientId && (!query.unreadOnly || !n.read))
      .sort(byNewest)
      .map((n) => ({ ...n }));
    return query.limit === undefined ? rows : rows.slice(0, query.limit);
  }

  // --- Jobs ---

  async listJobs(activeOnly = true): Promise<JobOpportunityRecord[]> {
    return [...this.state.jobs.values()]
      .filter((j) => !activeOnly || j.active)
      .sort(byNewest)
      .map((j) => ({ ...j }));
  }

  /** Job listings are reference data; this is how they get in. */
  addJob(input: Omit<JobOpportunityRecord, 'id' | 'createdAt'>): JobOpportunityRecord {
    const row: JobOpportunityRecord = { id: randomUUID(), ...input, createdAt: new Date() };
    this.state.jobs.set(row.id, row);
    return { ...row };
  }

  // --- Unit of work ---

  async withCaseLock<T>(caseId: string, work: (store: CaseStore) => Promise<T>): Promise<T> {
    if (this.lockedCaseId === caseId) return work(this);

    const { locks } = this.state;
    const previous = locks.get(caseId) ?? Promise.resolve();
    const run = previous.then(() => this.runUnit(caseId, work));
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    locks.set(caseId, tail);
    try {
      return await run;
    } finally {
      if (locks.get(caseId) === tail) locks.delete(caseId);
    }
  }

  private async runUnit<T>(caseId: string, work: (store: CaseStore) => Promise<T>): Promise<T> {
    if (!this.state.cases.has(caseId)) throw new NotFoundError('Case', caseId);

    const unit = new MemoryCaseStore(this.state, caseId);
    const snapshot = this.snapshot(caseId);
    try {
      return await work(unit);
    } catch (err) {
      this.restore(caseId, snapshot, unit.createdNotificationIds);
      throw err;
    }
  }

  private snapshot(caseId: string): CaseSnapshot {
    const { state } = this;
    return {
      caseRecord: state.cases.get(caseId),
      reports: [...state.reports.values()]
        .filter((r) => r.caseId === caseId)
        .map((record) => ({ record, seq: state.submissionSeq.get(record.id) })),
      tickets: [...state.tickets.values()].filter((t) => t.caseId === caseId),
    };
  }

  private restore(caseId: string, snapshot: CaseSnapshot, notificationIds: string[]): void {
    const { state } = this;
    for (const r of [...state.reports.values()]) {
      if (r.caseId === caseId) {
        state.reports.delete(r.id);
        state.submissionSeq.delete(r.id);
      }
    }
    for (const t of [...state.tickets.values()]) {
      if (t.caseId === caseId) state.tickets.delete(t.id);
    }
    if (snapshot.caseRecord) state.cases.set(caseId, snapshot.caseRecord);
    for (const { record, seq } of snapshot.reports) {
      state.reports.set(record.id, record);
      if (seq !== undefined) state.submissionSeq.set(record.id, seq);
    }
    for (const t of snapshot.tickets) state.tickets.set(t.id, t);
    for (const id of notificationIds) state.notifications.delete(id);
  }
}
