/**
 * Collaborator contracts consumed by the bridge core.
 *
 * The remote-control protocol client, the cast client, address discovery and
 * app metadata all live outside this package. `loopback.ts` provides
 * in-process implementations used for dry runs and tests.
 */

import { AttributeUpdate, DeviceConfig, KeyDirection, Keycode } from "./types.js";

export interface ClientCertificate {
  certPem: string;
  keyPem: string;
}

export interface DeviceInfo {
  manufacturer: string;
  model: string;
  name?: string;
}

export type ConnectOutcome =
  | { kind: "connected"; info: DeviceInfo }
  | { kind: "needs_pairing" }
  | { kind: "failed"; reason: string };

export type PairOutcome = { kind: "trusted" } | { kind: "failed"; reason: string };

/**
 * Why an established connection ended. `auth` means the device no longer
 * trusts our certificate.
 */
export type CloseReason = "standby" | "network" | "auth";

export interface VolumeInfo {
  level: number;
  muted: boolean;
}

export interface RemoteEventMap {
  power: (isOn: boolean) => void;
  app: (appId: string) => void;
  volume: (info: VolumeInfo) => void;
  closed: (reason: CloseReason) => void;
}

export interface RemoteControlClient {
  connect(address: string, certificate: ClientCertificate, signal: AbortSignal): Promise<ConnectOutcome>;
  /** Generate a new self-signed client certificate. Not trusted until paired. */
  createCertificate(): Promise<ClientCertificate>;
  /** Open the pairing channel; the device shows a PIN on screen. */
  startPairing(address: string, certificate: ClientCertificate, signal: AbortSignal): Promise<void>;
  pair(pin: string): Promise<PairOutcome>;
  /** Resolves false when the key could not be written to the connection. */
  sendKey(keycode: Keycode, direction: KeyDirection): Promise<boolean>;
  launchApp(link: string): Promise<boolean>;
  disconnect(): void;
  on<E extends keyof RemoteEventMap>(event: E, listener: RemoteEventMap[E]): void;
  off<E extends keyof RemoteEventMap>(event: E, listener: RemoteEventMap[E]): void;
}

export type RemoteClientFactory = (config: DeviceConfig) => RemoteControlClient;

export type CastPlayerState = "playing" | "paused" | "buffering" | "idle";

/** Any field may be absent (unchanged); `null` clears a text field. */
export interface CastEvent {
  title?: string | null;
  artist?: string | null;
  album?: string | null;
  imageUrl?: string | null;
  position?: number | null;
  duration?: number | null;
  playerState?: CastPlayerState;
}

export interface CastChannel {
  readonly events: AsyncIterable<CastEvent>;
  setVolume(level: number): Promise<void>;
  adjustVolume(delta: number): Promise<void>;
  setMuted(muted: boolean): Promise<void>;
  seek(positionSec: number): Promise<void>;
  close(): void;
}

export interface CastClient {
  subscribe(address: string, signal: AbortSignal): Promise<CastChannel>;
}

export interface AddressResolver {
  resolve(config: DeviceConfig): Promise<string | undefined>;
}

export interface AppMetadata {
  name?: string;
  iconUrl?: string;
}

export interface AppMetadataProvider {
  lookup(appId: string): Promise<AppMetadata | undefined>;
}

export interface StatePublisher {
  publish(deviceId: string, attributes: AttributeUpdate): void;
}

export interface Transports {
  createRemoteClient: RemoteClientFactory;
  cast?: CastClient;
  addressResolver?: AddressResolver;
  appMetadata?: AppMetadataProvider;
}
