import { EventEmitter } from "events";

import { CertificateStore } from "./certificateStore.js";
import { ConnectionLeases, connectionLeases } from "./connectionLeases.js";
import { DeviceSession, SessionSettings } from "./deviceSession.js";
import { BridgeError, describeError, failure } from "./errors.js";
import { ProfileResolver } from "./profiles.js";
import { StatePublisher, Transports } from "./transport.js";
import {
  AttributeUpdate,
  CommandParams,
  CommandResult,
  DeviceConfig,
  DeviceSnapshot,
  PairingResult,
  SessionState
} from "./types.js";

export interface RegistryOptions {
  transports: Transports;
  profiles: ProfileResolver;
  certificates: CertificateStore;
  settings: SessionSettings;
  publisher?: StatePublisher;
  leases?: ConnectionLeases;
}

/**
 * Owns one session per configured device and routes hub requests to it.
 * Emits `update` (device list), `attributes`, and `config` when a session
 * learns something that should be persisted.
 */
export class DeviceRegistry extends EventEmitter {
  private readonly sessions = new Map<string, DeviceSession>();
  private readonly unsubscribers = new Map<string, () => void>();
  private readonly leases: ConnectionLeases;
  private publisher?: StatePublisher;

  constructor(private readonly options: RegistryOptions) {
    super();
    this.leases = options.leases ?? connectionLeases;
    this.publisher = options.publisher;
  }

  setPublisher(publisher: StatePublisher): void {
    this.publisher = publisher;
  }

  /** Idempotent per device id; a known id updates the live session instead. */
  addDevice(config: DeviceConfig): DeviceSession {
    const existing = this.sessions.get(config.id);
    if (existing) {
      const current = existing.deviceConfig;
      existing.updateConfig({
        ...config,
        manufacturer: config.manufacturer || current.manufacturer,
        model: config.model || current.model
      });
      return existing;
    }

    const { transports } = this.options;
    const session = new DeviceSession(config, {
      client: transports.createRemoteClient(config),
      profiles: this.options.profiles,
      certificates: this.options.certificates,
      leases: this.leases,
      settings: this.options.settings,
      cast: transports.cast,
      addressResolver: transports.addressResolver,
      appMetadata: transports.appMetadata
    });
    this.sessions.set(config.id, session);
    this.unsubscribers.set(config.id, this.subscribe(session));
    console.log(`[Registry] Added device ${config.id} (${config.name}) at ${config.address}`);
    session.start();
    this.emitUpdate();
    return session;
  }

  removeDevice(deviceId: string): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) {
      return false;
    }
    this.sessions.delete(deviceId);
    session.close();
    this.unsubscribers.get(deviceId)?.();
    this.unsubscribers.delete(deviceId);
    this.options.certificates
      .remove(deviceId)
      .catch((error) => console.error(`[Registry] Failed to remove certificates of ${deviceId}: ${describeError(error)}`));
    console.log(`[Registry] Removed device ${deviceId}`);
    this.emitUpdate();
    return true;
  }

  async dispatch(deviceId: string, command: string, params: CommandParams = {}): Promise<CommandResult> {
    const session = this.sessions.get(deviceId);
    if (!session) {
      return failure("unknown_device", `unknown device ${deviceId}`);
    }
    try {
      return await session.sendCommand(command, params);
    } catch (error) {
      console.error(`[Registry] Command ${command} for ${deviceId} failed: ${describeError(error)}`);
      return failure("device_unreachable", describeError(error));
    }
  }

  async startPairing(deviceId: string): Promise<void> {
    await this.require(deviceId).startPairing();
  }

  async submitPin(deviceId: string, pin: string): Promise<PairingResult> {
    const session = this.sessions.get(deviceId);
    if (!session) {
      return { status: "error", kind: "unknown_device", message: `unknown device ${deviceId}` };
    }
    return session.submitPin(pin);
  }

  wake(deviceId: string): void {
    this.require(deviceId).wake();
  }

  list(): DeviceSnapshot[] {
    return Array.from(this.sessions.values())
      .map((session) => session.snapshot())
      .sort((a, b) => a.deviceId.localeCompare(b.deviceId));
  }

  get(deviceId: string): DeviceSnapshot | undefined {
    return this.sessions.get(deviceId)?.snapshot();
  }

  session(deviceId: string): DeviceSession | undefined {
    return this.sessions.get(deviceId);
  }

  /** Hub clients come and go; device sessions are not tied to them. */
  onClientDisconnect(clientId: string): void {
    console.log(`[Registry] Client ${clientId} disconnected; ${this.sessions.size} device session(s) unchanged`);
  }

  shutdown(): void {
    for (const deviceId of Array.from(this.sessions.keys())) {
      const session = this.sessions.get(deviceId);
      this.sessions.delete(deviceId);
      session?.close();
      this.unsubscribers.get(deviceId)?.();
      this.unsubscribers.delete(deviceId);
    }
    console.log("[Registry] All device sessions closed");
  }

  private require(deviceId: string): DeviceSession {
    const session = this.sessions.get(deviceId);
    if (!session) {
      throw new BridgeError("unknown_device", `unknown device ${deviceId}`);
    }
    return session;
  }

  private subscribe(session: DeviceSession): () => void {
    const deviceId = session.id;
    const onAttributes = (update: AttributeUpdate) =>
      this.isolate(deviceId, () => {
        this.publisher?.publish(deviceId, update);
        this.emit("attributes", deviceId, update);
      });
    const onState = (_state: SessionState) => this.isolate(deviceId, () => this.emitUpdate());
    const onConfig = (config: DeviceConfig) => this.isolate(deviceId, () => this.emit("config", config));

    session.on("attributes", onAttributes);
    session.on("state", onState);
    session.on("config", onConfig);
    return () => {
      session.off("attributes", onAttributes);
      session.off("state", onState);
      session.off("config", onConfig);
    };
  }

  private isolate(deviceId: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      console.error(`[Registry] Listener for ${deviceId} failed: ${describeError(error)}`);
    }
  }

  private emitUpdate(): void {
    this.emit("update", this.list());
  }
}
