export enum AccessHistoryAction {
  CREATED = 'CREATED',
  APPROVED = 'APPROVED',
  DENIED = 'DENIED',
  CANCELLED = 'CANCELLED',
  RENEWED = 'RENEWED',
}
