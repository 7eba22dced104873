/**
 * RPC bridge connection state.
 */

import { ClientInfo } from './rpc';

export interface RpcConnectionRecord {
  connectionId: string;
  clientName: string;
  clientVersion: string;
  initializedAt: string; // ISO-8601
  ttl: number;           // DynamoDB TTL (epoch seconds)
}

/**
 * How long an idle bridge connection stays valid (seconds). Every accepted
 * call pushes the expiry out again via touch().
 */
export const RPC_CONNECTION_TTL = 3600;

export interface ConnectionStore {
  markInitialized(connectionId: string, client: ClientInfo): Promise<void>;
  isInitialized(connectionId: string): Promise<boolean>;
  /** Extends the TTL of an initialized connection; no-op for unknown ids. */
  touch(connectionId: string): Promise<void>;
  remove(connectionId: string): Promise<void>;
}

export function expiryFrom(nowMs: number): number {
  return Math.floor(nowMs / 1000) + RPC_CONNECTION_TTL;
}

export function makeConnectionRecord(connectionId: string, client: ClientInfo, nowMs: number = Date.now()): RpcConnectionRecord {
  return {
    connectionId,
    clientName: client.name,
    clientVersion: client.version,
    initializedAt: new Date(nowMs).toISOString(),
    ttl: expiryFrom(nowMs),
  };
}

function isExpired(record: RpcConnectionRecord, nowMs: number): boolean {
  return record.ttl * 1000 <= nowMs;
}

export class InMemoryConnectionStore implements ConnectionStore {
  private readonly records = new Map<string, RpcConnectionRecord>();

  get size(): number {
    return this.records.size;
  }

  async markInitialized(connectionId: string, client: ClientInfo): Promise<void> {
    const now = Date.now();
    this.sweep(now);
    this.records.set(connectionId, makeConnectionRecord(connectionId, client, now));
  }

  async isInitialized(connectionId: string): Promise<boolean> {
    const record = this.records.get(connectionId);
    if (!record) {
      return false;
    }
    if (isExpired(record, Date.now())) {
      this.records.delete(connectionId);
      return false;
    }
    return true;
  }

  async touch(connectionId: string): Promise<void> {
    const record = this.records.get(connectionId);
    if (record) {
      record.ttl = expiryFrom(Date.now());
    }
  }

  async remove(connectionId: string): Promise<void> {
    this.records.delete(connectionId);
  }

  private sweep(nowMs: number): void {
    for (const [connectionId, record] of this.records) {
      if (isExpired(record, nowMs)) {
        this.records.delete(connectionId);
      }
    }
  }
}
