import { CertificateStore } from "../../src/certificateStore";
import { ConnectionLeases } from "../../src/connectionLeases";
import { DeviceSession, SessionSettings } from "../../src/deviceSession";
import { LoopbackCastClient, LoopbackDeviceOptions, LoopbackRemoteClient } from "../../src/loopback";
import { ProfileResolver } from "../../src/profiles";
import { AddressResolver, ClientCertificate } from "../../src/transport";
import { AttributeUpdate, DeviceConfig } from "../../src/types";

export const TEST_CERTIFICATE: ClientCertificate = {
  certPem: "test-cert",
  keyPem: "test-key"
};

export function fastSettings(overrides: Partial<SessionSettings> = {}): SessionSettings {
  return {
    connectTimeoutMs: 500,
    commandTimeoutMs: 500,
    reconnect: { initialDelayMs: 10, factor: 1.5, maxDelayMs: 40, maxAttempts: 5 },
    errorRetryMs: 60_000,
    commandQueueLimit: 4,
    castPositionThresholdSec: 30,
    longPressDelayMs: 10,
    ...overrides
  };
}

export function deviceConfig(overrides: Partial<DeviceConfig> = {}): DeviceConfig {
  return {
    id: "tv-living-room",
    name: "Living Room",
    address: "192.168.1.20",
    manufacturer: "",
    model: "",
    castEnabled: false,
    castVolume: false,
    castVolumeStep: 10,
    externalMetadata: false,
    authError: false,
    ...overrides
  };
}

export class MemoryCertificateStore implements CertificateStore {
  readonly certificates = new Map<string, ClientCertificate>();

  async load(deviceId: string): Promise<ClientCertificate | undefined> {
    return this.certificates.get(deviceId);
  }

  async save(deviceId: string, certificate: ClientCertificate): Promise<void> {
    this.certificates.set(deviceId, certificate);
  }

  async remove(deviceId: string): Promise<void> {
    this.certificates.delete(deviceId);
  }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}

export interface SessionHarness {
  session: DeviceSession;
  client: LoopbackRemoteClient;
  cast: LoopbackCastClient;
  certificates: MemoryCertificateStore;
  leases: ConnectionLeases;
  published: AttributeUpdate[];
}

export interface HarnessOptions {
  config?: Partial<DeviceConfig>;
  device?: LoopbackDeviceOptions;
  settings?: Partial<SessionSettings>;
  profiles?: ProfileResolver;
  addressResolver?: AddressResolver;
  /** Store a certificate the device already trusts. */
  paired?: boolean;
}

export function createHarness(options: HarnessOptions = {}): SessionHarness {
  const config = deviceConfig(options.config);
  const client = new LoopbackRemoteClient(options.device);
  const cast = new LoopbackCastClient();
  const certificates = new MemoryCertificateStore();
  const leases = new ConnectionLeases();
  if (options.paired ?? true) {
    certificates.certificates.set(config.id, TEST_CERTIFICATE);
    client.trusted.add(TEST_CERTIFICATE.certPem);
  }
  const session = new DeviceSession(config, {
    client,
    cast,
    certificates,
    leases,
    profiles: options.profiles ?? new ProfileResolver(),
    settings: fastSettings(options.settings),
    addressResolver: options.addressResolver
  });
  const published: AttributeUpdate[] = [];
  session.on("attributes", (update: AttributeUpdate) => published.push(update));
  return { session, client, cast, certificates, leases, published };
}
