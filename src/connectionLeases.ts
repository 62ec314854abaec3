/**
 * Process-wide table of device connections. A session may only open a
 * connection while it holds the lease for its device identity, so two
 * registries (or two hub instances sharing a process) never drive the same
 * television at once.
 */
export class ConnectionLeases {
  private readonly owners = new Map<string, object>();

  static identityOf(deviceId: string): string {
    return deviceId.trim().toLowerCase().replace(/[:-]/g, "");
  }

  acquire(deviceId: string, owner: object): boolean {
    const identity = ConnectionLeases.identityOf(deviceId);
    const current = this.owners.get(identity);
    if (current !== undefined && current !== owner) {
      return false;
    }
    this.owners.set(identity, owner);
    return true;
  }

  release(deviceId: string, owner: object): void {
    const identity = ConnectionLeases.identityOf(deviceId);
    if (this.owners.get(identity) === owner) {
      this.owners.delete(identity);
    }
  }

  holder(deviceId: string): object | undefined {
    return this.owners.get(ConnectionLeases.identityOf(deviceId));
  }
}

export const connectionLeases = new ConnectionLeases();
