// =============================================================================
// In-memory stand-in for the MLM API, used by assembly and CLI tests
// =============================================================================

import type { Credentials, InventoryApiClient, Session } from '../../services/inventory/client';
import type { RawSystem, SystemId } from '../../services/inventory/types';

type Operation = keyof InventoryApiClient;

export interface FakeServerData {
  systems: RawSystem[];
  rebootRequired?: SystemId[];
  /** Errata count per system id. */
  errata?: Record<string, number>;
  groups?: Record<string, string[]>;
  registrationDates?: Record<string, string>;
}

export class FakeInventoryClient implements InventoryApiClient {
  readonly calls: Operation[] = [];
  /** Errors thrown by an operation instead of answering. */
  readonly failures: Partial<Record<Operation, Error>> = {};
  credentials?: Credentials;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly data: FakeServerData) {}

  async authenticate(credentials: Credentials): Promise<Session> {
    this.record('authenticate');
    this.credentials = credentials;
    return { cookie: 'pxt-session-cookie=test' };
  }

  async listSystems(_session: Session): Promise<RawSystem[]> {
    this.record('listSystems');
    return this.data.systems.map((system) => ({ ...system }));
  }

  async listRebootRequired(_session: Session): Promise<SystemId[]> {
    this.record('listRebootRequired');
    return [...(this.data.rebootRequired ?? [])];
  }

  async getErrata(_session: Session, systemId: SystemId): Promise<unknown[]> {
    await this.detailCall('getErrata');
    const count = this.data.errata?.[String(systemId)] ?? 0;
    return Array.from({ length: count }, (_, i) => ({ id: `ERRATA-${i + 1}` }));
  }

  async listSystemGroups(_session: Session, systemId: SystemId): Promise<string[]> {
    await this.detailCall('listSystemGroups');
    return [...(this.data.groups?.[String(systemId)] ?? [])];
  }

  async getRegistrationDate(_session: Session, systemId: SystemId): Promise<string | undefined> {
    await this.detailCall('getRegistrationDate');
    return this.data.registrationDates?.[String(systemId)];
  }

  async logout(_session: Session): Promise<void> {
    this.record('logout');
  }

  count(operation: Operation): number {
    return this.calls.filter((call) => call === operation).length;
  }

  private record(operation: Operation): void {
    this.calls.push(operation);
    const failure = this.failures[operation];
    if (failure) throw failure;
  }

  private async detailCall(operation: Operation): Promise<void> {
    this.record(operation);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setImmediate(resolve));
    } finally {
      this.inFlight -= 1;
    }
  }
}
