import type {
  CaseRecord,
  City,
  JobOpportunityRecord,
  NotificationRecord,
  PersonRecord,
  ReportFields,
  ReportRecord,
  RiskTier,
  Role,
  TicketCategory,
  TicketRecord,
  TicketStatus,
} from './types';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface NewPerson {
  nationalId: string;
  fullName: string;
  role: Role;
  phone: string;
}

export interface NewCase {
  personId: string;
  releaseDate: string;
  followupEndDate: string;
  city: City;
  notes: string;
  assignedCaseWorkerId: string | null;
}

export interface NewTicket {
  caseId: string;
  category: TicketCategory;
  notes: string;
  createdById: string | null;
}

/** Idempotency key of an auto-generated ticket. */
export interface AutoTicketKey {
  caseId: string;
  category: TicketCategory;
  status: 'open';
  autoGenerated: true;
}

export interface CaseFilter {
  riskTier?: RiskTier;
  city?: City;
  completed?: boolean;
  assignedCaseWorkerId?: string;
}

export interface NotificationQuery {
  unreadOnly?: boolean;
  limit?: number;
}

export interface FindOrCreateResult<T> {
  record: T;
  created: boolean;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Persistence boundary of the engine. Every method either completes or
 * throws an EngineError; adapters translate their own failures.
 */
export interface CaseStore {
  getPerson(id: string): Promise<PersonRecord | null>;
  getPersonByNationalId(nationalId: string): Promise<PersonRecord | null>;
  createPerson(input: NewPerson): Promise<PersonRecord>;
  /** Cascades to the person's case and notifications; clears references. */
  deletePerson(id: string): Promise<boolean>;

  getCase(id: string): Promise<CaseRecord | null>;
  getCaseByPerson(personId: string): Promise<CaseRecord | null>;
  listCases(filter?: CaseFilter): Promise<CaseRecord[]>;
  createCase(input: NewCase): Promise<CaseRecord>;
  saveCase(record: CaseRecord): Promise<CaseRecord>;

  /** Keyed on (caseId, monthIndex): a resubmission replaces the month. */
  upsertReport(caseId: string, monthIndex: number, fields: ReportFields): Promise<ReportRecord>;
  /** Most recently submitted report, regardless of month index. */
  latestReport(caseId: string): Promise<ReportRecord | null>;
  listReports(caseId: string): Promise<ReportRecord[]>;

  findOrCreateTicket(
    key: AutoTicketKey,
    defaults: { notes: string },
  ): Promise<FindOrCreateResult<TicketRecord>>;
  createTicket(input: NewTicket): Promise<TicketRecord>;
  getTicket(id: string): Promise<TicketRecord | null>;
  saveTicket(record: TicketRecord): Promise<TicketRecord>;
  listTickets(caseId: string, statuses?: readonly TicketStatus[]): Promise<TicketRecord[]>;

  createNotification(recipientId: string, message: string, link: string): Promise<NotificationRecord>;
  getNotification(id: string): Promise<NotificationRecord | null>;
  saveNotification(record: NotificationRecord): Promise<NotificationRecord>;
  listNotifications(recipientId: string, query?: NotificationQuery): Promise<NotificationRecord[]>;

  listJobs(activeOnly?: boolean): Promise<JobOpportunityRecord[]>;

  /**
   * Runs `work` as one unit of work holding the case's lock. Work for the
   * same case is serialized; a failure rolls back what `work` wrote.
   */
  withCaseLock<T>(caseId: string, work: (store: CaseStore) => Promise<T>): Promise<T>;
}
