import EventEmitter from "events";
import fs from "fs";
import path from "path";

import { FSWatcher, watch } from "chokidar";

import { describeError } from "./errors.js";
import { DeviceConfig, DeviceConfigPayload, deviceConfigSchema } from "./types.js";

// Older configuration files used these names.
const LEGACY_KEYS: Record<string, keyof DeviceConfigPayload> = {
  device_id: "id",
  alias: "name",
  ip: "address",
  host: "address",
  profile: "profile_override",
  use_chromecast: "cast_enabled",
  use_chromecast_volume: "cast_volume",
  volume_step: "cast_volume_step",
  use_external_metadata: "external_metadata"
};

export function toDeviceConfig(payload: DeviceConfigPayload): DeviceConfig {
  return {
    id: payload.id,
    name: payload.name,
    address: payload.address,
    manufacturer: payload.manufacturer,
    model: payload.model,
    profileOverride: payload.profile_override,
    castEnabled: payload.cast_enabled,
    castVolume: payload.cast_volume,
    castVolumeStep: payload.cast_volume_step,
    externalMetadata: payload.external_metadata,
    authError: payload.auth_error
  };
}

export function toPayload(config: DeviceConfig): DeviceConfigPayload {
  return {
    id: config.id,
    name: config.name,
    address: config.address,
    manufacturer: config.manufacturer,
    model: config.model,
    profile_override: config.profileOverride,
    cast_enabled: config.castEnabled,
    cast_volume: config.castVolume,
    cast_volume_step: config.castVolumeStep,
    external_metadata: config.externalMetadata,
    auth_error: config.authError
  };
}

export function normalizeEntry(entry: unknown): DeviceConfig | undefined {
  if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
    return undefined;
  }
  const raw: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    const target = Object.hasOwn(LEGACY_KEYS, key) ? LEGACY_KEYS[key] : key;
    if (!Object.hasOwn(raw, target) || key === target) {
      raw[target] = value;
    }
  }
  const parsed = deviceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[ConfigStore] Skipping invalid device entry: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`);
    return undefined;
  }
  return toDeviceConfig(parsed.data);
}

export function extractDevices(data: unknown): DeviceConfig[] {
  let list: unknown[] = [];
  if (Array.isArray(data)) {
    list = data;
  } else if (data && typeof data === "object" && "devices" in data && Array.isArray(data.devices)) {
    list = data.devices;
  }
  return list.map((entry) => normalizeEntry(entry)).filter((entry): entry is DeviceConfig => Boolean(entry));
}

function sameConfig(a: DeviceConfig, b: DeviceConfig): boolean {
  return JSON.stringify(toPayload(a)) === JSON.stringify(toPayload(b));
}

/**
 * The configured devices, backed by `devices.json`. The file is watched;
 * edits are diffed against the in-memory copy and surface as `added`,
 * `changed` and `removed` events.
 */
export class DeviceConfigStore extends EventEmitter {
  private devices = new Map<string, DeviceConfig>();
  private watcher?: FSWatcher;
  private writing = Promise.resolve();

  constructor(private readonly devicesPath: string) {
    super();
  }

  async init(watchFile = true): Promise<void> {
    await this.loadFromDisk();
    if (watchFile) {
      this.watch();
    }
  }

  async close(): Promise<void> {
    await this.watcher?.close();
    this.watcher = undefined;
    await this.writing;
  }

  getAll(): DeviceConfig[] {
    return Array.from(this.devices.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  get(deviceId: string): DeviceConfig | undefined {
    return this.devices.get(deviceId);
  }

  async upsert(config: DeviceConfig): Promise<void> {
    const previous = this.devices.get(config.id);
    if (previous && sameConfig(previous, config)) {
      return;
    }
    this.devices.set(config.id, { ...config });
    await this.persist();
  }

  async remove(deviceId: string): Promise<boolean> {
    if (!this.devices.delete(deviceId)) {
      return false;
    }
    await this.persist();
    return true;
  }

  /** Re-read the file and emit the differences. */
  async loadFromDisk(): Promise<void> {
    if (!fs.existsSync(this.devicesPath)) {
      return;
    }
    try {
      const raw = await fs.promises.readFile(this.devicesPath, "utf-8");
      if (!raw.trim()) {
        return;
      }
      this.apply(extractDevices(JSON.parse(raw)));
    } catch (error) {
      console.warn(`[ConfigStore] Failed to load devices: ${describeError(error)}`);
    }
  }

  private apply(next: DeviceConfig[]): void {
    const incoming = new Map(next.map((device) => [device.id, device]));
    const previous = this.devices;
    this.devices = incoming;
    for (const [deviceId, device] of incoming) {
      const before = previous.get(deviceId);
      if (!before) {
        this.emit("added", device);
      } else if (!sameConfig(before, device)) {
        this.emit("changed", device, before);
      }
    }
    for (const deviceId of previous.keys()) {
      if (!incoming.has(deviceId)) {
        this.emit("removed", deviceId);
      }
    }
  }

  private persist(): Promise<void> {
    const payload = { devices: this.getAll().map(toPayload) };
    this.writing = this.writing.then(() => this.write(payload));
    return this.writing;
  }

  private async write(payload: { devices: DeviceConfigPayload[] }): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.devicesPath), { recursive: true });
      const temp = `${this.devicesPath}.tmp`;
      await fs.promises.writeFile(temp, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
      await fs.promises.rename(temp, this.devicesPath);
    } catch (error) {
      console.error(`[ConfigStore] Cannot write ${this.devicesPath}: ${describeError(error)}`);
    }
  }

  private watch(): void {
    if (!fs.existsSync(path.dirname(this.devicesPath))) {
      fs.mkdirSync(path.dirname(this.devicesPath), { recursive: true });
    }
    this.watcher = watch(this.devicesPath, { ignoreInitial: true, awaitWriteFinish: true });
    this.watcher.on("add", () => this.reload());
    this.watcher.on("change", () => this.reload());
  }

  private reload(): void {
    this.loadFromDisk().catch((error) => console.error(`[ConfigStore] Reload failed: ${describeError(error)}`));
  }
}
