import { z } from 'zod';
import {
  CITIES,
  FAMILY_STATUSES,
  HOUSING_STATUSES,
  JOB_STATUSES,
  MENTAL_STATES,
  PROGRAM_MONTHS,
  RISK_TIERS,
  ROLES,
  TICKET_CATEGORIES,
  TICKET_STATUSES,
} from '@shared/constants';
import { ValidationError } from './errors';
import { parseCalendarDate } from './timeline';

const recordIdSchema = z.string().uuid();

/** Record ids are UUIDs; anything else cannot name a stored record. */
export function isRecordId(value: string): boolean {
  return recordIdSchema.safeParse(value).success;
}

const calendarDate = z
  .string()
  .refine((v) => parseCalendarDate(v) !== null, { message: 'Expected a YYYY-MM-DD date' });

const monthIndexSchema = z.number().int().min(1).max(PROGRAM_MONTHS);

export const checkinInputSchema = z.object({
  monthIndex: monthIndexSchema.optional(),
  housingStatus: z.enum(HOUSING_STATUSES),
  jobStatus: z.enum(JOB_STATUSES),
  mentalState: z.enum(MENTAL_STATES),
  familyStatus: z.enum(FAMILY_STATUSES),
  notes: z.string().max(5000).default(''),
});

export const registerPersonSchema = z.object({
  nationalId: z.string().trim().min(1).max(10),
  fullName: z.string().trim().min(1).max(200),
  role: z.enum(ROLES).default('beneficiary'),
  phone: z.string().trim().max(15).default(''),
});

export const openCaseSchema = z
  .object({
    personId: z.string().min(1),
    releaseDate: calendarDate,
    followupEndDate: calendarDate.optional(),
    city: z.enum(CITIES).default('riyadh'),
    notes: z.string().default(''),
    assignedCaseWorkerId: z.string().min(1).nullable().default(null),
  })
  // ISO dates compare correctly as strings
  .refine((v) => v.followupEndDate === undefined || v.followupEndDate >= v.releaseDate, {
    message: 'Follow-up end date cannot be before the release date',
    path: ['followupEndDate'],
  });

export const assignCaseWorkerSchema = z.object({
  caseWorkerId: z.string().min(1).nullable(),
});

export const manualTicketSchema = z.object({
  category: z.enum(TICKET_CATEGORIES),
  notes: z.string().default(''),
});

export const ticketStatusSchema = z.object({
  status: z.enum(TICKET_STATUSES),
});

export const messageSchema = z.object({
  content: z.string().trim().min(1).max(2000),
});

/** Query of a person's notification list. */
export const notificationQuerySchema = z.object({
  unreadOnly: z.boolean().optional(),
  limit: z.number().int().min(1).max(100).optional(),
});

/** Same query as sent over HTTP, where every value is a string. */
export const inboxQuerySchema = z
  .object({
    unread: z.enum(['true', 'false']).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional(),
  })
  .transform((q) => ({ unreadOnly: q.unread === 'true', limit: q.limit }));

export const caseListQuerySchema = z.object({
  risk: z.enum(RISK_TIERS).optional(),
  city: z.enum(CITIES).optional(),
  includeCompleted: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
});

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function validate<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
): ValidationResult<z.output<T>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: describeIssues(result.error) };
  }
  return { success: true, data: result.data };
}

/** Like `validate`, but raises a ValidationError on bad input. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = validate(schema, input);
  if (!result.success) throw new ValidationError(result.error);
  return result.data;
}
