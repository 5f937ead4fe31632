export interface AccessGatePort {
  /** Resolves false for every kind of failure; never rejects. */
  authenticate(username: string, password: string): Promise<boolean>;
}
