export interface JwtPayload {
  /** Member ID */
  sub: string;
  email: string;
}
