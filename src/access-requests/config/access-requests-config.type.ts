export type AccessRequestsConfig = {
  protocolPrefix: string;
  validityDays: number; // approvedAt → expiresAt
  renewalWindowDays: number; // renewal allowed this many days before expiry
};
