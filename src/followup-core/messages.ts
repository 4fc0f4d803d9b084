import type { RiskTier, TicketCategory, TicketStatus } from './types';

export const TIER_MESSAGES: Record<RiskTier, string> = {
  green: 'Your situation is stable. Keep up the good work!',
  yellow: 'There are some concerns. A caseworker will reach out to you soon.',
  red: 'We need to contact you urgently. Please wait for a call from your caseworker.',
};

export const TICKET_CATEGORY_LABELS: Record<TicketCategory, string> = {
  job: 'Job support',
  social: 'Social support',
  psychological: 'Psychological support',
  housing: 'Housing support',
  financial: 'Financial support',
};

export const TICKET_STATUS_LABELS: Record<TicketStatus, string> = {
  open: 'Open',
  in_progress: 'In progress',
  resolved: 'Resolved',
  closed: 'Closed',
};

const MESSAGE_PREVIEW_LENGTH = 50;

export const notificationText = {
  urgentAlert(category: TicketCategory, beneficiaryName: string): string {
    switch (category) {
      case 'psychological':
        return `Alert: ${beneficiaryName} needs urgent psychological support`;
      case 'housing':
        return `Alert: ${beneficiaryName} is homeless`;
      case 'job':
        return `Alert: ${beneficiaryName} reported being unemployed`;
      case 'social':
        return `Alert: ${beneficiaryName} reported family difficulties`;
      case 'financial':
        return `Alert: ${beneficiaryName} needs financial support`;
    }
  },
  ticketOpened: (category: TicketCategory) =>
    `A new support ticket was opened: ${TICKET_CATEGORY_LABELS[category]}`,
  ticketStatusChanged: (status: TicketStatus) =>
    `Your ticket status was updated: ${TICKET_STATUS_LABELS[status]}`,
  programCompleted: () =>
    'Congratulations! You have successfully completed your follow-up program',
  messageFromBeneficiary(beneficiaryName: string, content: string): string {
    const preview =
      content.length > MESSAGE_PREVIEW_LENGTH
        ? `${content.slice(0, MESSAGE_PREVIEW_LENGTH)}...`
        : content;
    return `New message from ${beneficiaryName}: ${preview}`;
  },
};
