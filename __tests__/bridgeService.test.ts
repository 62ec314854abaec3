import fs from "fs";
import os from "os";
import path from "path";

import { BridgeService } from "../src/bridgeService";
import { ConnectionLeases } from "../src/connectionLeases";
import { DeviceConfigStore } from "../src/deviceConfigStore";
import { DeviceRegistry } from "../src/deviceRegistry";
import { CommandLog } from "../src/commandLog";
import { LoopbackTransports, createLoopbackTransports } from "../src/loopback";
import { ProfileResolver } from "../src/profiles";
import { MemoryCertificateStore, TEST_CERTIFICATE, deviceConfig, fastSettings, silenceConsole, waitFor } from "./helpers/fixtures";

describe("BridgeService", () => {
  let dir: string;
  let store: DeviceConfigStore;
  let registry: DeviceRegistry;
  let transports: LoopbackTransports;
  let commandLog: CommandLog;
  let service: BridgeService;

  beforeAll(() => {
    silenceConsole();
  });

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bridge-"));
    store = new DeviceConfigStore(path.join(dir, "devices.json"));
    await store.init(false);
    transports = createLoopbackTransports({ trustAll: true });
    const certificates = new MemoryCertificateStore();
    certificates.certificates.set("tv-living-room", TEST_CERTIFICATE);
    registry = new DeviceRegistry({
      transports,
      certificates,
      profiles: new ProfileResolver(),
      settings: fastSettings(),
      leases: new ConnectionLeases()
    });
    commandLog = new CommandLog();
    service = new BridgeService(registry, store, new ProfileResolver(), commandLog);
  });

  afterEach(async () => {
    registry.shutdown();
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts sessions for the stored devices", async () => {
    await store.upsert(deviceConfig());

    service.start();

    expect(registry.list().map((device) => device.deviceId)).toEqual(["tv-living-room"]);
    await waitFor(() => registry.get("tv-living-room")?.state === "connected");
  });

  it("records every dispatched command with its result", async () => {
    service.start();
    await service.addDevice({
      id: "tv-living-room",
      name: "Living Room",
      address: "192.168.1.20",
      manufacturer: "",
      model: "",
      cast_enabled: false,
      cast_volume: false,
      cast_volume_step: 10,
      external_metadata: false,
      auth_error: false
    });
    await waitFor(() => registry.get("tv-living-room")?.state === "connected");

    await service.executeCommand("tv-living-room", "home", {}, "client-1");
    await service.executeCommand("tv-nowhere", "volume", { volume: 20 });

    expect(commandLog.all()).toEqual([
      expect.objectContaining({
        deviceId: "tv-living-room",
        command: "home",
        params: undefined,
        result: { status: "ok" },
        clientId: "client-1"
      }),
      expect.objectContaining({
        deviceId: "tv-nowhere",
        command: "volume",
        params: { volume: 20 },
        result: { status: "error", kind: "unknown_device", message: "unknown device tv-nowhere" }
      })
    ]);
  });

  it("persists added devices and forgets removed ones", async () => {
    service.start();

    const snapshot = await service.addDevice({
      id: "tv-den",
      name: "Den",
      address: "10.0.0.7",
      manufacturer: "",
      model: "",
      cast_enabled: false,
      cast_volume: false,
      cast_volume_step: 10,
      external_metadata: false,
      auth_error: false
    });

    expect(snapshot.deviceId).toBe("tv-den");
    expect(store.get("tv-den")?.address).toBe("10.0.0.7");
    await expect(service.removeDevice("tv-den")).resolves.toBe(true);
    expect(store.get("tv-den")).toBeUndefined();
    expect(registry.get("tv-den")).toBeUndefined();
    await expect(service.removeDevice("tv-den")).resolves.toBe(false);
  });

  it("follows edits to the configuration file", async () => {
    service.start();

    store.emit("added", deviceConfig({ id: "tv-den", name: "Den" }));
    expect(registry.get("tv-den")?.name).toBe("Den");

    store.emit("removed", "tv-den");
    expect(registry.get("tv-den")).toBeUndefined();
  });

  it("writes configuration learned by a session back to the store", async () => {
    service.start();

    registry.emit("config", deviceConfig({ manufacturer: "Sony", model: "BRAVIA" }));

    await waitFor(() => store.get("tv-living-room")?.manufacturer === "Sony");
  });

  it("answers hub requests", async () => {
    service.start();

    await expect(
      service.handle({ type: "pin", deviceId: "tv-nowhere", pin: "1234" }, "client-1")
    ).resolves.toEqual({ status: "error", kind: "unknown_device", message: "unknown device tv-nowhere" });
    await expect(
      service.handle({ type: "command", deviceId: "tv-nowhere", command: "home" }, "client-1")
    ).resolves.toMatchObject({ status: "error", kind: "unknown_device" });
    expect(commandLog.recent(1)[0].clientId).toBe("client-1");
  });

  it("summarizes the known profiles", () => {
    expect(service.profileSummaries()).toEqual([
      expect.objectContaining({ name: "default", manufacturer: "default", model: "" })
    ]);
  });
});
