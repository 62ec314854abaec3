import { DeviceConfigStore, toDeviceConfig } from "./deviceConfigStore.js";
import { DeviceRegistry } from "./deviceRegistry.js";
import { describeError } from "./errors.js";
import { CommandLog } from "./commandLog.js";
import { ProfileResolver } from "./profiles.js";
import { HubRequestHandler } from "./websocketHub.js";
import {
  CommandParams,
  CommandResult,
  DeviceConfig,
  DeviceConfigPayload,
  DeviceSnapshot,
  Feature,
  PairingResult,
  SocketRequest
} from "./types.js";

export interface ProfileSummary {
  name: string;
  manufacturer: string;
  model: string;
  features: Feature[];
}

/**
 * Glue between the hub surface (HTTP and WebSocket), the device registry and
 * the persisted configuration.
 */
export class BridgeService implements HubRequestHandler {
  constructor(
    readonly registry: DeviceRegistry,
    readonly configStore: DeviceConfigStore,
    readonly profiles: ProfileResolver,
    readonly commandLog: CommandLog
  ) {}

  /** Start sessions for stored devices and keep registry and file in sync. */
  start(): void {
    for (const device of this.configStore.getAll()) {
      this.registry.addDevice(device);
    }
    this.configStore.on("added", (device: DeviceConfig) => this.registry.addDevice(device));
    this.configStore.on("changed", (device: DeviceConfig) => this.registry.addDevice(device));
    this.configStore.on("removed", (deviceId: string) => this.registry.removeDevice(deviceId));
    this.registry.on("config", (device: DeviceConfig) => {
      this.configStore
        .upsert(device)
        .catch((error) => console.error(`[Bridge] Failed to persist ${device.id}: ${describeError(error)}`));
    });
  }

  async executeCommand(
    deviceId: string,
    command: string,
    params: CommandParams = {},
    clientId?: string
  ): Promise<CommandResult> {
    const result = await this.registry.dispatch(deviceId, command, params);
    this.commandLog.record({
      deviceId,
      command,
      params: Object.keys(params).length > 0 ? params : undefined,
      result,
      clientId
    });
    if (result.status === "error") {
      console.warn(`[Bridge] ${command} -> ${deviceId}: ${result.kind} (${result.message})`);
    }
    return result;
  }

  async addDevice(payload: DeviceConfigPayload): Promise<DeviceSnapshot> {
    const session = this.registry.addDevice(toDeviceConfig(payload));
    await this.configStore.upsert(session.deviceConfig);
    return session.snapshot();
  }

  async removeDevice(deviceId: string): Promise<boolean> {
    const removed = this.registry.removeDevice(deviceId);
    const forgotten = await this.configStore.remove(deviceId);
    return removed || forgotten;
  }

  profileSummaries(): ProfileSummary[] {
    return this.profiles.all().map((profile) => ({
      name: profile.name,
      manufacturer: profile.manufacturer,
      model: profile.model,
      features: profile.features
    }));
  }

  async handle(request: SocketRequest, clientId: string): Promise<CommandResult | PairingResult> {
    switch (request.type) {
      case "command":
        return this.executeCommand(request.deviceId, request.command, request.params, clientId);
      case "pin":
        return this.registry.submitPin(request.deviceId, request.pin);
    }
  }

  onClientDisconnect(clientId: string): void {
    this.registry.onClientDisconnect(clientId);
  }
}
