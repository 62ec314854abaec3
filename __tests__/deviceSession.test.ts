/**
 * Device session lifecycle against the loopback remote client: connecting,
 * pairing, command queueing, power semantics and reconnects.
 */

import { paths } from "../src/config";
import { ProfileResolver } from "../src/profiles";
import { CommandResult } from "../src/types";
import { SessionHarness, createHarness, silenceConsole, sleep, waitFor } from "./helpers/fixtures";

let profiles: ProfileResolver;
let harness: SessionHarness | undefined;

beforeAll(async () => {
  silenceConsole();
  profiles = await ProfileResolver.load(paths.resolveDataPath("profiles"));
});

afterEach(() => {
  harness?.session.close();
  harness = undefined;
});

function start(options: Parameters<typeof createHarness>[0] = {}): SessionHarness {
  harness = createHarness({ profiles, ...options });
  harness.session.start();
  return harness;
}

async function connected(options: Parameters<typeof createHarness>[0] = {}): Promise<SessionHarness> {
  const h = start(options);
  await waitFor(() => h.session.state === "connected");
  return h;
}

describe("DeviceSession", () => {
  describe("connecting", () => {
    it("connects with a trusted certificate and resolves the profile from the device", async () => {
      const { session, published } = await connected({ device: { manufacturer: "Sony", model: "BRAVIA 4K GB" } });

      expect(session.snapshot().profile).toBe("sony_bravia");
      expect(session.deviceConfig.manufacturer).toBe("Sony");
      expect(session.deviceConfig.model).toBe("BRAVIA 4K GB");
      expect(published).toContainEqual({ connection: "connecting" });
      expect(published).toContainEqual({ connection: "connected" });
    });

    it("honours a profile override", async () => {
      const { session } = await connected({
        config: { profileOverride: "nvidia_shield" },
        device: { manufacturer: "Sony", model: "BRAVIA" }
      });

      expect(session.snapshot().profile).toBe("nvidia_shield");
    });

    it("publishes the power state reported after connecting", async () => {
      const { session, published } = await connected({ device: { poweredOn: true } });

      await waitFor(() => session.powerState === "on");
      expect(published).toContainEqual({ state: "on" });
    });

    it("retries with backoff and gives up with an unavailable state", async () => {
      const h = start({ settings: { reconnect: { initialDelayMs: 5, factor: 1.5, maxDelayMs: 20, maxAttempts: 3 } } });
      h.client.reachable = false;

      await waitFor(() => h.session.state === "error");
      expect(h.client.connectAttempts).toBe(3);
      expect(h.published).toContainEqual({ connection: "reconnecting" });
      expect(h.published).toContainEqual({ connection: "error", state: "unavailable" });
    });

    it("asks the resolver for a new address after repeated failures", async () => {
      const resolver = { resolve: jest.fn().mockResolvedValue("192.168.1.77") };
      harness = createHarness({
        profiles,
        addressResolver: resolver,
        settings: { rediscoverEvery: 2, reconnect: { initialDelayMs: 5, factor: 1, maxDelayMs: 5, maxAttempts: 10 } }
      });
      const { session, client } = harness;
      const changed = jest.fn();
      session.on("addressChanged", changed);
      client.failNextConnects = 2;

      session.start();
      await waitFor(() => session.state === "connected");

      expect(resolver.resolve).toHaveBeenCalledTimes(1);
      expect(changed).toHaveBeenCalledWith("192.168.1.77");
      expect(session.deviceConfig.address).toBe("192.168.1.77");
    });
  });

  describe("pairing", () => {
    it("enters pairing without a certificate and rejects commands meanwhile", async () => {
      const h = start({ paired: false });
      await waitFor(() => h.client.pairingInProgress);

      expect(h.session.state).toBe("pairing");
      expect(h.session.deviceConfig.authError).toBe(true);
      await expect(h.session.sendCommand("home")).resolves.toEqual({
        status: "error",
        kind: "pairing_required",
        message: "device tv-living-room must be paired first"
      });
    });

    it("stays in pairing after a wrong PIN and connects after the right one", async () => {
      const h = start({ paired: false });
      await waitFor(() => h.client.pairingInProgress);

      const wrong = await h.session.submitPin("9999");
      expect(wrong).toEqual({ status: "error", kind: "pairing_failed", message: "wrong PIN" });
      expect(h.session.state).toBe("pairing");
      expect(h.certificates.certificates.size).toBe(0);
      expect(h.published).toContainEqual({ pairing_failures: 1 });

      const right = await h.session.submitPin("1234");
      expect(right).toEqual({ status: "trusted" });
      await waitFor(() => h.session.state === "connected");
      expect(h.certificates.certificates.has("tv-living-room")).toBe(true);
      expect(h.session.deviceConfig.authError).toBe(false);
    });

    it("rejects a PIN when no pairing is in progress", async () => {
      const { session } = await connected();

      await expect(session.submitPin("1234")).resolves.toEqual({
        status: "error",
        kind: "pairing_required",
        message: "no pairing in progress"
      });
    });

    it("moves to pairing when the device rejects the certificate and does not loop reconnects", async () => {
      const h = await connected();

      h.client.simulateClose("auth");
      await waitFor(() => h.session.state === "pairing");
      await sleep(60);

      expect(h.client.connectAttempts).toBe(1);
      expect(h.session.deviceConfig.authError).toBe(true);
    });

    it("discards the candidate certificate when the session is closed mid-pairing", async () => {
      const h = start({ paired: false });
      await waitFor(() => h.client.pairingInProgress);

      h.session.close();
      const result = await h.session.submitPin("1234");

      expect(result.status).toBe("error");
      expect(h.certificates.certificates.size).toBe(0);
      expect(h.client.trusted.size).toBe(0);
    });
  });

  describe("commands", () => {
    it("sends mapped keys with their profile action", async () => {
      const { session, client } = await connected({ device: { manufacturer: "NVIDIA", model: "SHIELD Android TV" } });

      await expect(session.sendCommand("HOME_LONG")).resolves.toEqual({ status: "ok" });
      await expect(session.sendCommand("BACK_DOUBLE")).resolves.toEqual({ status: "ok" });
      await expect(session.sendCommand("menu")).resolves.toEqual({ status: "ok" });

      expect(client.sentKeys).toEqual([
        { keycode: "HOME", direction: "start_long" },
        { keycode: "HOME", direction: "end_long" },
        { keycode: "BACK", direction: "short" },
        { keycode: "BACK", direction: "short" },
        { keycode: "MENU", direction: "short" }
      ]);
    });

    it("passes literal and numeric keycodes through", async () => {
      const { session, client } = await connected();

      await session.sendCommand("KEYCODE_TV_INPUT_HDMI_2");
      await session.sendCommand("175");

      expect(client.sentKeys).toEqual([
        { keycode: "KEYCODE_TV_INPUT_HDMI_2", direction: "short" },
        { keycode: 175, direction: "short" }
      ]);
    });

    it("reports unsupported commands in any state", async () => {
      harness = createHarness({ profiles });

      await expect(harness.session.sendCommand("launch_rocket")).resolves.toEqual({
        status: "error",
        kind: "not_supported",
        message: "command launch_rocket is not supported by profile default"
      });
    });

    it("rejects ordinary commands while disconnected", async () => {
      harness = createHarness({ profiles });

      await expect(harness.session.sendCommand("home")).resolves.toEqual({
        status: "error",
        kind: "device_unreachable",
        message: "device tv-living-room is disconnected"
      });
      expect(harness.session.state).toBe("disconnected");
    });

    it("queues commands while connecting and sends them once connected", async () => {
      const h = start({ device: { connectDelayMs: 40 } });

      await expect(h.session.sendCommand("home")).resolves.toEqual({ status: "queued" });
      expect(h.session.queueDepth).toBe(1);

      await waitFor(() => h.client.sentKeys.length === 1);
      expect(h.client.sentKeys[0]).toEqual({ keycode: "HOME", direction: "short" });
    });

    it("drops the oldest request when the queue is full", async () => {
      const { session, client } = await connected();
      jest
        .spyOn(client, "sendKey")
        .mockImplementation(() => new Promise<boolean>((resolve) => setTimeout(() => resolve(true), 20)));

      const pending: Promise<CommandResult>[] = [];
      for (let i = 0; i < 6; i += 1) {
        pending.push(session.sendCommand("home"));
      }
      const results = await Promise.all(pending);

      expect(results[1]).toEqual({
        status: "error",
        kind: "queue_overflow",
        message: "command home dropped: queue is full"
      });
      expect(results.filter((result) => result.status === "ok")).toHaveLength(5);
    });

    it("validates parameters of source selection", async () => {
      const { session } = await connected();

      await expect(session.sendCommand("select_source", {})).resolves.toEqual({
        status: "error",
        kind: "invalid_params",
        message: "source is required"
      });
    });

    it("launches apps and switches inputs for select_source", async () => {
      const { session, client } = await connected();

      await session.sendCommand("select_source", { source: "Netflix" });
      await session.sendCommand("select_source", { source: "HDMI 3" });

      expect(client.launchedApps).toEqual(["netflix://"]);
      expect(client.sentKeys).toEqual([{ keycode: "KEYCODE_TV_INPUT_HDMI_3", direction: "short" }]);
    });

    it("reconnects when a key cannot be written", async () => {
      const { session, client } = await connected();
      jest.spyOn(client, "sendKey").mockResolvedValueOnce(false);

      const result = await session.sendCommand("home");

      expect(result).toEqual({ status: "error", kind: "device_unreachable", message: "key HOME could not be sent" });
      await waitFor(() => client.connectAttempts === 2 && session.state === "connected");
    });

    it("times out an unacknowledged key and answers the callers waiting behind it", async () => {
      const { session, client } = await connected({ settings: { commandTimeoutMs: 100 } });
      jest.spyOn(client, "sendKey").mockImplementationOnce(() => new Promise<boolean>(() => undefined));
      const states: string[] = [];
      session.on("state", (next: string) => states.push(next));

      const started = Date.now();
      const hung = session.sendCommand("home");
      const waiting = session.sendCommand("menu");

      await expect(hung).resolves.toEqual({
        status: "error",
        kind: "timeout",
        message: "command home timed out after 100ms"
      });
      await expect(waiting).resolves.toEqual({ status: "queued" });
      expect(Date.now() - started).toBeLessThan(1_000);
      expect(states[0]).toBe("reconnecting");
      await waitFor(() => client.sentKeys.some((key) => key.keycode === "MENU"));
      expect(session.state).toBe("connected");
      expect(client.connectAttempts).toBe(2);
    });

    it("tells a caller stuck behind slow commands that its command is queued", async () => {
      const { session, client } = await connected({ settings: { commandTimeoutMs: 100 } });
      let sent = 0;
      jest.spyOn(client, "sendKey").mockImplementation(
        () =>
          new Promise<boolean>((resolve) =>
            setTimeout(() => {
              sent += 1;
              resolve(true);
            }, 70)
          )
      );

      const results = await Promise.all([
        session.sendCommand("home"),
        session.sendCommand("home"),
        session.sendCommand("home")
      ]);

      expect(results).toEqual([{ status: "ok" }, { status: "ok" }, { status: "queued" }]);
      await waitFor(() => sent === 3);
      expect(session.state).toBe("connected");
    });
  });

  describe("command sequences", () => {
    it("repeats a single command", async () => {
      const { session, client } = await connected();

      await expect(session.sendCommand("send_cmd", { command: "home", repeat: "3", delay: "" })).resolves.toEqual({
        status: "ok"
      });

      expect(client.sentKeys).toEqual([
        { keycode: "HOME", direction: "short" },
        { keycode: "HOME", direction: "short" },
        { keycode: "HOME", direction: "short" }
      ]);
    });

    it("sends every key of a sequence in order for each round", async () => {
      const { session, client } = await connected();

      await session.sendCommand("send_cmd_sequence", { sequence: ["home", "menu"], repeat: 2 });

      expect(client.sentKeys.map((key) => key.keycode)).toEqual(["HOME", "MENU", "HOME", "MENU"]);
    });

    it("waits the given delay after each key", async () => {
      const { session, client } = await connected();
      const started = Date.now();

      await session.sendCommand("send_cmd_sequence", { sequence: ["home", "menu"], delay: 30 });

      expect(Date.now() - started).toBeGreaterThanOrEqual(55);
      expect(client.sentKeys).toHaveLength(2);
    });

    it("validates sequence parameters before sending anything", async () => {
      const { session, client } = await connected();

      await expect(session.sendCommand("send_cmd", {})).resolves.toEqual({
        status: "error",
        kind: "invalid_params",
        message: "send_cmd needs a command, repeat 1-100 and delay 0-60000"
      });
      await expect(session.sendCommand("send_cmd_sequence", { sequence: ["home"], repeat: 0 })).resolves.toMatchObject({
        kind: "invalid_params"
      });
      await expect(session.sendCommand("send_cmd_sequence", { sequence: ["home", "launch_rocket"] })).resolves.toEqual({
        status: "error",
        kind: "not_supported",
        message: "command launch_rocket is not supported by profile default"
      });
      expect(client.sentKeys).toEqual([]);
    });

    it("replies before a long sequence is done and keeps sending", async () => {
      const { session, client } = await connected({ settings: { sequenceReplyMs: 50 } });

      await expect(session.sendCommand("send_cmd", { command: "home", repeat: 4, delay: 40 })).resolves.toEqual({
        status: "ok"
      });

      expect(client.sentKeys.length).toBeLessThan(4);
      await waitFor(() => client.sentKeys.length === 4);
    });

    it("reports the key failures of a sequence", async () => {
      const h = start({ paired: false });
      await waitFor(() => h.session.state === "pairing");

      await expect(h.session.sendCommand("send_cmd", { command: "home" })).resolves.toEqual({
        status: "error",
        kind: "pairing_required",
        message: "device tv-living-room must be paired first"
      });
    });
  });

  describe("power", () => {
    it("sends POWER for on only while the device is not on", async () => {
      const { session, client } = await connected();
      await waitFor(() => session.powerState === "off");

      await session.sendCommand("on");
      await waitFor(() => session.powerState === "on");
      await session.sendCommand("on");

      expect(client.sentKeys).toEqual([{ keycode: "POWER", direction: "short" }]);
    });

    it("sends POWER for off only while the device is on", async () => {
      const { session, client } = await connected();
      await waitFor(() => session.powerState === "off");

      await session.sendCommand("off");
      expect(client.sentKeys).toHaveLength(0);

      client.simulatePower(true);
      await session.sendCommand("off");
      expect(client.sentKeys).toEqual([{ keycode: "POWER", direction: "short" }]);
    });

    it("always sends POWER for toggle", async () => {
      const { session, client } = await connected({ device: { poweredOn: true } });
      await waitFor(() => session.powerState === "on");

      await session.sendCommand("toggle");

      expect(client.sentKeys).toEqual([{ keycode: "POWER", direction: "short" }]);
    });

    it("reconnects from error on power-on and then sends POWER", async () => {
      const h = start({ settings: { reconnect: { initialDelayMs: 5, factor: 1, maxDelayMs: 5, maxAttempts: 2 } } });
      h.client.reachable = false;
      await waitFor(() => h.session.state === "error");

      h.client.reachable = true;
      await expect(h.session.sendCommand("off")).resolves.toEqual({
        status: "error",
        kind: "device_unreachable",
        message: "device tv-living-room is error"
      });
      await expect(h.session.sendCommand("on")).resolves.toEqual({ status: "queued" });

      await waitFor(() => h.client.sentKeys.length === 1);
      expect(h.session.state).toBe("connected");
      expect(h.client.sentKeys[0]).toEqual({ keycode: "POWER", direction: "short" });
    });
  });

  describe("device events", () => {
    it("reconnects immediately after a standby close", async () => {
      const h = await connected({
        settings: { reconnect: { initialDelayMs: 5_000, factor: 1.5, maxDelayMs: 30_000, maxAttempts: 5 } }
      });

      h.client.simulateClose("standby");
      await waitFor(() => h.session.state === "connected" && h.client.connectAttempts === 2, 500);
    });

    it("maps the foreground app to a source name", async () => {
      const h = await connected();

      h.client.simulateApp("com.netflix.ninja");
      h.client.simulateApp("com.google.android.tvlauncher");

      expect(h.published).toContainEqual({ source: "Netflix", media_title: "Netflix" });
      expect(h.published).toContainEqual({ source: "Android TV", media_title: "" });
    });

    it("publishes volume changes", async () => {
      const h = await connected();

      h.client.simulateVolume({ level: 35, muted: false });

      expect(h.published).toContainEqual({ volume: 35, muted: false });
    });

    it("ignores device events after close", async () => {
      const h = await connected();
      h.session.close();
      const count = h.published.length;

      h.client.simulateApp("com.netflix.ninja");

      expect(h.published).toHaveLength(count);
      expect(h.client.listenerCount("app")).toBe(0);
    });
  });

  describe("cast", () => {
    it("publishes cast media status while connected", async () => {
      const h = await connected({ config: { castEnabled: true }, device: { poweredOn: true } });
      await waitFor(() => h.cast.channel("192.168.1.20") !== undefined);

      h.cast.emit("192.168.1.20", { title: "Big Buck Bunny", playerState: "playing" });

      await waitFor(() => h.published.some((update) => update.media_title === "Big Buck Bunny"));
      expect(h.published).toContainEqual({ state: "playing", media_title: "Big Buck Bunny" });
    });

    it("drives volume through the cast channel when enabled", async () => {
      const h = await connected({
        config: { castEnabled: true, castVolume: true, castVolumeStep: 5 },
        device: { poweredOn: true }
      });
      await waitFor(() => h.cast.channel("192.168.1.20") !== undefined);
      const channel = h.cast.channel("192.168.1.20");

      await expect(h.session.sendCommand("volume_up")).resolves.toEqual({ status: "ok" });
      await expect(h.session.sendCommand("volume", { volume: 20 })).resolves.toEqual({ status: "ok" });
      await expect(h.session.sendCommand("seek", { media_position: 95 })).resolves.toEqual({ status: "ok" });

      expect(h.client.sentKeys).toHaveLength(0);
      expect(channel?.volume).toBe(0.2);
      expect(channel?.lastSeek).toBe(95);
    });

    it("fails seek without a cast channel", async () => {
      const { session } = await connected();

      await expect(session.sendCommand("seek", { media_position: 10 })).resolves.toEqual({
        status: "error",
        kind: "device_unreachable",
        message: "cast channel is not connected"
      });
    });

    it("detaches the cast channel on disconnect", async () => {
      const h = await connected({ config: { castEnabled: true }, device: { poweredOn: true } });
      await waitFor(() => h.cast.channel("192.168.1.20") !== undefined);

      h.session.close();

      expect(h.cast.channel("192.168.1.20")).toBeUndefined();
    });
  });
});
