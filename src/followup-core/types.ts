import type {
  City,
  FamilyStatus,
  HousingStatus,
  JobStatus,
  MentalState,
  RiskTier,
  Role,
  TicketCategory,
  TicketStatus,
} from '@shared/types';

export type {
  City,
  FamilyStatus,
  HousingStatus,
  JobStatus,
  MentalState,
  RiskTier,
  Role,
  TicketCategory,
  TicketStatus,
};

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface PersonRecord {
  id: string;
  nationalId: string;
  fullName: string;
  role: Role;
  phone: string;
  createdAt: Date;
}

/** Release profile: the 12-month follow-up record of one beneficiary. */
export interface CaseRecord {
  id: string;
  personId: string;
  /** ISO calendar date (YYYY-MM-DD). */
  releaseDate: string;
  /** ISO calendar date (YYYY-MM-DD). Set once at intake. */
  followupEndDate: string;
  riskTier: RiskTier;
  city: City;
  notes: string;
  assignedCaseWorkerId: string | null;
  completed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** The four status answers of a check-in. */
export interface ReportStatus {
  housingStatus: HousingStatus;
  jobStatus: JobStatus;
  mentalState: MentalState;
  familyStatus: FamilyStatus;
}

export interface ReportFields extends ReportStatus {
  notes: string;
}

export interface ReportRecord extends ReportFields {
  id: string;
  caseId: string;
  monthIndex: number;
  createdAt: Date;
  /** Refreshed whenever the month is resubmitted. */
  submittedAt: Date;
}

export interface TicketRecord {
  id: string;
  caseId: string;
  category: TicketCategory;
  status: TicketStatus;
  notes: string;
  autoGenerated: boolean;
  createdById: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NotificationRecord {
  id: string;
  recipientId: string;
  message: string;
  link: string;
  read: boolean;
  createdAt: Date;
}

export interface JobOpportunityRecord {
  id: string;
  title: string;
  company: string;
  description: string;
  city: City;
  active: boolean;
  linkUrl: string;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Caller context
// ---------------------------------------------------------------------------

export interface Actor {
  personId: string;
  role: Role;
}

/**
 * Explicit caller identity and clock, passed into every engine operation.
 */
export interface EngineContext {
  actor: Actor;
  now: Date;
}
