export enum AccessRequestStatus {
  ACTIVE = 'ACTIVE',
  DENIED = 'DENIED',
  CANCELLED = 'CANCELLED',
}
