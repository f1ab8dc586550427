/**
 * Plume Token Cache
 *
 * Sole owner of per-identity credentials and bearer tokens. Everything else
 * asks for a token through ensureValidToken().
 */

import { PlumeAuthConfigError } from "../errors";
import type { PlumeCredentials, PlumeTokenRecord } from "../types";
import type { PlumeTokenIssuer } from "./token-issuer";

interface IdentityRecord {
  credentials: PlumeCredentials;
  token?: PlumeTokenRecord;
}

export class PlumeTokenCache {
  private records = new Map<string, IdentityRecord>();
  private inFlight = new Map<string, Promise<PlumeTokenRecord>>();

  constructor(
    private readonly issuer: Pick<PlumeTokenIssuer, "issueToken">,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Replace the identity's credentials. Any cached token is dropped.
   */
  setCredentials(identity: string, credentials: PlumeCredentials): void {
    this.records.set(identity, { credentials: { ...credentials } });
    this.inFlight.delete(identity);
    console.log(`[Plume Auth] Credentials stored for ${identity} (partner ${credentials.partnerId})`);
  }

  getCredentials(identity: string): PlumeCredentials | undefined {
    const record = this.records.get(identity);
    return record ? { ...record.credentials } : undefined;
  }

  hasCredentials(identity: string): boolean {
    return this.records.has(identity);
  }

  isValid(identity: string): boolean {
    const token = this.records.get(identity)?.token;
    return token !== undefined && this.now() < token.expiresAt;
  }

  /**
   * Return the cached token, or issue a new one with the stored credentials.
   * Concurrent callers for one identity share a single issuance.
   */
  async ensureValidToken(identity: string): Promise<PlumeTokenRecord> {
    const record = this.records.get(identity);
    if (!record) {
      throw new PlumeAuthConfigError(`No Plume credentials configured for ${identity}. Run /network setup first.`);
    }

    if (record.token && this.now() < record.token.expiresAt) {
      return record.token;
    }

    const pending = this.inFlight.get(identity);
    if (pending) {
      return pending;
    }

    const issuance = this.refresh(identity, record);
    this.inFlight.set(identity, issuance);
    try {
      return await issuance;
    } finally {
      if (this.inFlight.get(identity) === issuance) {
        this.inFlight.delete(identity);
      }
    }
  }

  /**
   * Drop the token only; credentials stay so the next call re-issues.
   */
  invalidateToken(identity: string): void {
    const record = this.records.get(identity);
    if (record?.token) {
      record.token = undefined;
      console.log(`[Plume Auth] Token invalidated for ${identity}`);
    }
  }

  clearCredentials(identity: string): boolean {
    this.inFlight.delete(identity);
    return this.records.delete(identity);
  }

  private async refresh(identity: string, record: IdentityRecord): Promise<PlumeTokenRecord> {
    record.token = undefined;
    try {
      const token = await this.issuer.issueToken(record.credentials);
      // Setup may have replaced the record while the request was out
      if (this.records.get(identity) === record) {
        record.token = token;
      }
      console.log(`[Plume Auth] Token issued for ${identity}, expires in ${token.expiresIn}s`);
      return token;
    } catch (error) {
      record.token = undefined;
      console.warn(
        `[Plume Auth] Token issuance failed for ${identity}:`,
        error instanceof Error ? error.message : String(error),
      );
      throw error;
    }
  }
}
