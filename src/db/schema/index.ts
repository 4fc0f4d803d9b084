export { persons } from './persons';
export { cases } from './cases';
export { reports } from './reports';
export { tickets, openAutoTicketPredicate } from './tickets';
export { notifications } from './notifications';
export { jobOpportunities } from './job-opportunities';
