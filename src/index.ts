import http from "http";
import { WebSocketServer } from "ws";

import { BridgeService } from "./bridgeService.js";
import { FileCertificateStore } from "./certificateStore.js";
import { config } from "./config.js";
import { DeviceConfigStore } from "./deviceConfigStore.js";
import { DeviceRegistry } from "./deviceRegistry.js";
import { CommandLog } from "./commandLog.js";
import { createLoopbackTransports } from "./loopback.js";
import { ProfileResolver } from "./profiles.js";
import { createApp } from "./server.js";
import { CommandLogEntry, DeviceSnapshot } from "./types.js";
import { WebsocketHub } from "./websocketHub.js";

async function main(): Promise<void> {
  console.log("[backend] running on the loopback transport");
  const profiles = await ProfileResolver.load(config.profilesPath);
  const configStore = new DeviceConfigStore(config.devicesPath);
  await configStore.init();

  const registry = new DeviceRegistry({
    transports: createLoopbackTransports({ trustAll: true }),
    profiles,
    certificates: new FileCertificateStore(config.certsPath),
    settings: config
  });
  const commandLog = new CommandLog(config.auditLogPath);
  const service = new BridgeService(registry, configStore, profiles, commandLog);

  const app = createApp(service);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  const hub = new WebsocketHub(wss, service);

  registry.setPublisher(hub);
  registry.on("update", (devices: DeviceSnapshot[]) => hub.broadcast({ type: "devices", devices }));
  commandLog.on("entry", (entry: CommandLogEntry) => hub.broadcast({ type: "commandlog", entry }));
  service.start();

  server.listen(config.port, config.host, () => {
    console.log(`[backend] listening on http://${config.host}:${config.port}`);
  });

  process.on("SIGINT", () => {
    registry.shutdown();
    configStore
      .close()
      .catch((error) => console.error("[backend] failed to close config store:", error))
      .finally(() => server.close(() => process.exit(0)));
  });
}

main().catch((error) => {
  console.error("[backend] failed to start:", error);
  process.exit(1);
});
