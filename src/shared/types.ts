import type {
  CITIES,
  FAMILY_STATUSES,
  HOUSING_STATUSES,
  JOB_STATUSES,
  MENTAL_STATES,
  RISK_TIERS,
  ROLES,
  TICKET_CATEGORIES,
  TICKET_STATUSES,
} from './constants';

export type Role = (typeof ROLES)[number];
export type RiskTier = (typeof RISK_TIERS)[number];
export type City = (typeof CITIES)[number];
export type HousingStatus = (typeof HOUSING_STATUSES)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];
export type MentalState = (typeof MENTAL_STATES)[number];
export type FamilyStatus = (typeof FAMILY_STATUSES)[number];
export type TicketCategory = (typeof TICKET_CATEGORIES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
}
