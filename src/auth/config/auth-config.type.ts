export type AuthConfig = {
  secret: string;
};
