import { EventEmitter } from "events";

import { z } from "zod";

import { CastStatusMixer, isValidImageUrl } from "./castMixer.js";
import { CertificateStore } from "./certificateStore.js";
import { ReconnectPolicy } from "./config.js";
import { ConnectionLeases } from "./connectionLeases.js";
import { BridgeError, describeError, failure } from "./errors.js";
import { ProfileResolver } from "./profiles.js";
import { friendlyAppName, isHomescreenApp, isStandbyApp, resolveSource, sourceList } from "./sources.js";
import { Backoff, pause, withTimeout } from "./timing.js";
import {
  AddressResolver,
  AppMetadataProvider,
  CastChannel,
  CastClient,
  ClientCertificate,
  CloseReason,
  ConnectOutcome,
  DeviceInfo,
  PairOutcome,
  RemoteControlClient,
  VolumeInfo
} from "./transport.js";
import {
  AttributeUpdate,
  CommandParams,
  CommandResult,
  DeviceConfig,
  DeviceProfile,
  DeviceSnapshot,
  KeyAction,
  KeyDirection,
  Keycode,
  PairingResult,
  PowerState,
  SessionState
} from "./types.js";

export interface SessionSettings {
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  reconnect: ReconnectPolicy;
  errorRetryMs: number;
  commandQueueLimit: number;
  castPositionThresholdSec: number;
  longPressDelayMs?: number;
  /** Ask the address resolver for a new address every n failed attempts. */
  rediscoverEvery?: number;
  /** How long a `send_cmd` caller waits before the sequence is left running on its own. */
  sequenceReplyMs?: number;
}

export interface SessionDependencies {
  client: RemoteControlClient;
  profiles: ProfileResolver;
  certificates: CertificateStore;
  leases: ConnectionLeases;
  settings: SessionSettings;
  cast?: CastClient;
  addressResolver?: AddressResolver;
  appMetadata?: AppMetadataProvider;
}

const LONG_PRESS_DELAY_MS = 800;
const REDISCOVER_EVERY = 10;
const SEQUENCE_REPLY_MS = 4_500;

const volumeParams = z.object({ volume: z.number().min(0).max(100) });
const seekParams = z.object({ media_position: z.number().nonnegative() });
const sourceParams = z.object({ source: z.string().min(1) });

// remotes send empty strings for unset numeric fields
function integerParam(fallback: number, min: number, max: number) {
  return z
    .preprocess((value) => (value === "" || value === null ? undefined : value), z.coerce.number().finite().optional())
    .transform((value) => Math.trunc(value ?? fallback))
    .pipe(z.number().min(min).max(max));
}

const repeatParam = integerParam(1, 1, 100);
const delayParam = integerParam(0, 0, 60_000);
const sendCmdParams = z.object({ command: z.string().min(1), repeat: repeatParam, delay: delayParam });
const sendSequenceParams = z.object({
  sequence: z.array(z.string().min(1)).min(1),
  repeat: repeatParam,
  delay: delayParam
});

type CommandRun = () => Promise<CommandResult>;

interface CommandSequence {
  commands: string[];
  repeat: number;
  delayMs: number;
}

type CommandPlan =
  | { kind: "run"; run: CommandRun; wakes: boolean }
  | { kind: "sequence"; sequence: CommandSequence }
  | { kind: "reject"; result: CommandResult };

interface QueuedCommand {
  name: string;
  run: CommandRun;
  /** Answers the caller once; later results are only logged. */
  settle: (result: CommandResult) => void;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One physical device: its connection lifecycle, pairing, command queue and
 * the cast status feed. Emits `state`, `attributes`, `config` and
 * `addressChanged`.
 */
export class DeviceSession extends EventEmitter {
  private currentState: SessionState = "disconnected";
  private power: PowerState = "unknown";
  private profile?: DeviceProfile;
  private readonly queue: QueuedCommand[] = [];
  private pumping = false;
  private lifecycle?: AbortController;
  private retryTimer?: NodeJS.Timeout;
  private closed = false;
  private readonly backoff: Backoff;
  private failedAttempts = 0;
  private pendingCertificate?: ClientCertificate;
  private pairingFailures = 0;
  private foregroundApp?: string;
  private readonly attributes: AttributeUpdate = {};
  private readonly mixer?: CastStatusMixer;

  constructor(
    private config: DeviceConfig,
    private readonly deps: SessionDependencies
  ) {
    super();
    this.backoff = new Backoff(deps.settings.reconnect);
    if (deps.cast) {
      this.mixer = new CastStatusMixer(config.id, deps.cast, (delta) => this.applyMediaDelta(delta), {
        positionThresholdSec: deps.settings.castPositionThresholdSec
      });
    }
    deps.client.on("power", this.handlePower);
    deps.client.on("app", this.handleApp);
    deps.client.on("volume", this.handleVolume);
    deps.client.on("closed", this.handleClosed);
  }

  get id(): string {
    return this.config.id;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get powerState(): PowerState {
    return this.power;
  }

  get deviceConfig(): DeviceConfig {
    return { ...this.config };
  }

  get queueDepth(): number {
    return this.queue.length;
  }

  get activeProfile(): DeviceProfile {
    if (this.profile) {
      return this.profile;
    }
    return this.selectProfile({ manufacturer: this.config.manufacturer, model: this.config.model });
  }

  snapshot(): DeviceSnapshot {
    return {
      deviceId: this.config.id,
      name: this.config.name,
      address: this.config.address,
      state: this.currentState,
      power: this.power,
      profile: this.profile?.name,
      queueDepth: this.queue.length,
      attributes: { ...this.attributes }
    };
  }

  start(): void {
    if (this.closed) {
      throw new BridgeError("device_unreachable", `session ${this.config.id} is closed`);
    }
    if (this.currentState === "disconnected" || this.currentState === "error") {
      this.beginConnect("connecting");
    }
  }

  wake(): void {
    console.log(`[DeviceSession ${this.config.id}] wake requested in state ${this.currentState}`);
    this.start();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.cancelLifecycle();
    this.mixer?.detach();
    const { client } = this.deps;
    client.off("power", this.handlePower);
    client.off("app", this.handleApp);
    client.off("volume", this.handleVolume);
    client.off("closed", this.handleClosed);
    client.disconnect();
    this.deps.leases.release(this.config.id, this);
    this.failQueued("device_unreachable", "session closed");
    this.power = "unknown";
    this.setState("disconnected");
  }

  /** Apply edited configuration to the live session. */
  updateConfig(next: DeviceConfig): void {
    const previous = this.config;
    this.config = { ...next };
    const connected = this.currentState === "connected";

    if (previous.castEnabled && !next.castEnabled) {
      this.mixer?.detach();
    } else if (!previous.castEnabled && next.castEnabled && connected) {
      this.mixer?.attach(next.address);
    }

    if (previous.profileOverride !== next.profileOverride && connected) {
      this.profile = this.selectProfile({ manufacturer: next.manufacturer, model: next.model });
      this.publish({ features: this.profile.features });
    }

    if (previous.address !== next.address && !this.closed) {
      console.log(`[DeviceSession ${next.id}] address changed ${previous.address} -> ${next.address}`);
      if (connected || this.currentState === "connecting" || this.currentState === "reconnecting") {
        this.dropConnection();
        this.beginConnect("reconnecting");
      } else if (this.currentState === "error") {
        this.beginConnect("connecting");
      }
    }
  }

  startPairing(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new BridgeError("device_unreachable", `session ${this.config.id} is closed`));
    }
    if (!this.deps.leases.acquire(this.config.id, this)) {
      return Promise.reject(
        new BridgeError("device_unreachable", `device ${this.config.id} is controlled by another session`)
      );
    }
    this.dropConnection();
    this.cancelLifecycle();
    const controller = new AbortController();
    this.lifecycle = controller;
    return this.beginPairing(controller.signal, "pairing requested");
  }

  async submitPin(pin: string): Promise<PairingResult> {
    const candidate = this.pendingCertificate;
    const signal = this.lifecycle?.signal;
    if (this.currentState !== "pairing" || !candidate || !signal) {
      return { status: "error", kind: "pairing_required", message: "no pairing in progress" };
    }

    let outcome: PairOutcome;
    try {
      outcome = await withTimeout(this.deps.client.pair(pin), this.deps.settings.commandTimeoutMs, "pair");
    } catch (error) {
      outcome = { kind: "failed", reason: describeError(error) };
    }
    if (signal.aborted || this.pendingCertificate !== candidate) {
      return { status: "error", kind: "pairing_failed", message: "pairing was cancelled" };
    }
    if (outcome.kind === "failed") {
      this.pairingFailures += 1;
      this.publish({ pairing_failures: this.pairingFailures });
      console.warn(`[DeviceSession ${this.config.id}] pairing failed (${this.pairingFailures}): ${outcome.reason}`);
      return { status: "error", kind: "pairing_failed", message: outcome.reason };
    }

    this.pendingCertificate = undefined;
    try {
      await this.deps.certificates.save(this.config.id, candidate);
    } catch (error) {
      console.error(`[DeviceSession ${this.config.id}] cannot store client certificate: ${describeError(error)}`);
      return { status: "error", kind: "certificate_invalid", message: describeError(error) };
    }
    if (signal.aborted) {
      // the device was closed or removed while the certificate was written
      await this.deps.certificates
        .remove(this.config.id)
        .catch((error) =>
          console.error(`[DeviceSession ${this.config.id}] cannot discard client certificate: ${describeError(error)}`)
        );
      return { status: "error", kind: "pairing_failed", message: "pairing was cancelled" };
    }
    console.log(`[DeviceSession ${this.config.id}] paired`);
    this.beginConnect();
    return { status: "trusted" };
  }

  async sendCommand(command: string, params: CommandParams = {}): Promise<CommandResult> {
    if (this.closed) {
      return failure("device_unreachable", `session ${this.config.id} is closed`);
    }
    const plan = this.plan(command, params);
    if (plan.kind === "reject") {
      return plan.result;
    }
    if (plan.kind === "sequence") {
      return this.sendSequence(command, plan.sequence);
    }

    switch (this.currentState) {
      case "connected":
        return this.enqueue(command, plan.run);
      case "connecting":
      case "reconnecting":
        this.enqueueDetached(command, plan.run);
        return { status: "queued" };
      case "pairing":
        return failure("pairing_required", `device ${this.config.id} must be paired first`);
      case "disconnected":
      case "error":
        if (plan.wakes) {
          this.enqueueDetached(command, plan.run);
          this.start();
          return { status: "queued" };
        }
        return failure("device_unreachable", `device ${this.config.id} is ${this.currentState}`);
    }
  }

  private plan(command: string, params: CommandParams): CommandPlan {
    const name = command.toLowerCase();
    const profile = this.activeProfile;
    const mapping = this.deps.profiles.mapCommand(profile, command);
    const castVolume = this.config.castEnabled && this.config.castVolume;

    switch (name) {
      case "volume": {
        const parsed = volumeParams.safeParse(params);
        if (!parsed.success) {
          return { kind: "reject", result: failure("invalid_params", "volume must be a number between 0 and 100") };
        }
        return { kind: "run", wakes: false, run: () => this.castControl((channel) => channel.setVolume(parsed.data.volume / 100)) };
      }
      case "seek": {
        const parsed = seekParams.safeParse(params);
        if (!parsed.success) {
          return { kind: "reject", result: failure("invalid_params", "media_position must be a non-negative number") };
        }
        return { kind: "run", wakes: false, run: () => this.castControl((channel) => channel.seek(parsed.data.media_position)) };
      }
      case "select_source": {
        const parsed = sourceParams.safeParse(params);
        if (!parsed.success) {
          return { kind: "reject", result: failure("invalid_params", "source is required") };
        }
        return { kind: "run", wakes: false, run: () => this.selectSource(parsed.data.source) };
      }
      case "send_cmd": {
        const parsed = sendCmdParams.safeParse(params);
        if (!parsed.success) {
          return { kind: "reject", result: failure("invalid_params", "send_cmd needs a command, repeat 1-100 and delay 0-60000") };
        }
        const { command: key, repeat, delay: delayMs } = parsed.data;
        return this.planSequence({ commands: [key], repeat, delayMs });
      }
      case "send_cmd_sequence": {
        const parsed = sendSequenceParams.safeParse(params);
        if (!parsed.success) {
          return {
            kind: "reject",
            result: failure("invalid_params", "send_cmd_sequence needs a sequence, repeat 1-100 and delay 0-60000")
          };
        }
        const { sequence, repeat, delay: delayMs } = parsed.data;
        return this.planSequence({ commands: sequence, repeat, delayMs });
      }
      case "volume_up":
      case "volume_down":
      case "mute_toggle":
        if (castVolume) {
          return {
            kind: "run",
            wakes: false,
            run: async () => {
              const result = await this.castVolume(name);
              if (result) {
                return result;
              }
              return mapping.kind === "key"
                ? this.pressKey(mapping.keycode, mapping.action)
                : failure("not_supported", `command ${command} is not supported by profile ${profile.name}`);
            }
          };
        }
        break;
    }

    if (mapping.kind === "not_supported") {
      return {
        kind: "reject",
        result: failure("not_supported", `command ${command} is not supported by profile ${profile.name}`)
      };
    }
    const { keycode, action } = mapping;
    switch (name) {
      case "on":
        return { kind: "run", wakes: true, run: () => this.powerCommand("on", keycode, action) };
      case "off":
        return { kind: "run", wakes: false, run: () => this.powerCommand("off", keycode, action) };
      case "toggle":
        return { kind: "run", wakes: this.power !== "on", run: () => this.pressKey(keycode, action) };
      default:
        return { kind: "run", wakes: false, run: () => this.pressKey(keycode, action) };
    }
  }

  private planSequence(sequence: CommandSequence): CommandPlan {
    for (const command of sequence.commands) {
      const plan = this.plan(command, {});
      if (plan.kind === "reject") {
        return plan;
      }
    }
    return { kind: "sequence", sequence };
  }

  /**
   * Each key of a sequence goes through the command queue on its own. The
   * caller is answered after `sequenceReplyMs` at the latest; a longer
   * sequence keeps running and its outcome is only logged.
   */
  private sendSequence(name: string, sequence: CommandSequence): Promise<CommandResult> {
    const running = this.runSequence(sequence);
    return new Promise((resolve) => {
      let answered = false;
      const answer = (result: CommandResult) => {
        clearTimeout(timer);
        if (!answered) {
          answered = true;
          resolve(result);
        } else if (result.status === "error") {
          console.warn(`[DeviceSession ${this.config.id}] ${name} failed after reply: ${result.kind} ${result.message}`);
        }
      };
      const timer = setTimeout(() => {
        console.log(`[DeviceSession ${this.config.id}] ${name} still running, replying early`);
        answer({ status: "ok" });
      }, this.deps.settings.sequenceReplyMs ?? SEQUENCE_REPLY_MS);
      timer.unref();
      running.then(answer, (error: unknown) => answer(failure("device_unreachable", describeError(error))));
    });
  }

  /** The last failing key decides the result; later keys are still sent. */
  private async runSequence(sequence: CommandSequence): Promise<CommandResult> {
    let result: CommandResult = { status: "ok" };
    for (let round = 0; round < sequence.repeat; round += 1) {
      for (const command of sequence.commands) {
        if (this.closed) {
          return failure("device_unreachable", `session ${this.config.id} is closed`);
        }
        const outcome = await this.sendCommand(command);
        if (outcome.status === "error") {
          result = outcome;
        }
        if (sequence.delayMs > 0) {
          await delay(sequence.delayMs);
        }
      }
    }
    return result;
  }

  private async powerCommand(target: "on" | "off", keycode: Keycode, action: KeyAction): Promise<CommandResult> {
    if (target === "on" && this.power === "on") {
      return { status: "ok" };
    }
    if (target === "off" && this.power !== "on") {
      return { status: "ok" };
    }
    return this.pressKey(keycode, action);
  }

  private async pressKey(keycode: Keycode, action: KeyAction): Promise<CommandResult> {
    switch (action) {
      case "short":
        await this.sendKey(keycode, "short");
        break;
      case "double_click":
        await this.sendKey(keycode, "short");
        await this.sendKey(keycode, "short");
        break;
      case "long":
        await this.sendKey(keycode, "start_long");
        await delay(this.deps.settings.longPressDelayMs ?? LONG_PRESS_DELAY_MS);
        await this.sendKey(keycode, "end_long");
        break;
      case "begin":
        await this.sendKey(keycode, "start_long");
        break;
      case "end":
        await this.sendKey(keycode, "end_long");
        break;
    }
    return { status: "ok" };
  }

  private async sendKey(keycode: Keycode, direction: KeyDirection): Promise<void> {
    const sent = await this.deps.client.sendKey(keycode, direction);
    if (!sent) {
      throw new BridgeError("device_unreachable", `key ${keycode} could not be sent`);
    }
  }

  private async selectSource(source: string): Promise<CommandResult> {
    const target = resolveSource(source);
    if (target.kind === "input") {
      return this.pressKey(target.keycode, "short");
    }
    const launched = await this.deps.client.launchApp(target.link);
    if (!launched) {
      throw new BridgeError("device_unreachable", `app ${source} could not be launched`);
    }
    return { status: "ok" };
  }

  private async castControl(action: (channel: CastChannel) => Promise<void>): Promise<CommandResult> {
    const channel = this.mixer?.activeChannel;
    if (!channel) {
      return failure("device_unreachable", "cast channel is not connected");
    }
    try {
      await action(channel);
      return { status: "ok" };
    } catch (error) {
      return failure("device_unreachable", `cast command failed: ${describeError(error)}`);
    }
  }

  /** Undefined when no cast channel is attached, so the caller falls back to keys. */
  private async castVolume(name: string): Promise<CommandResult | undefined> {
    if (!this.mixer?.activeChannel) {
      return undefined;
    }
    const step = this.config.castVolumeStep / 100;
    if (name === "mute_toggle") {
      const muted = !(this.attributes.muted ?? false);
      const result = await this.castControl((channel) => channel.setMuted(muted));
      if (result.status === "ok") {
        this.publish({ muted });
      }
      return result;
    }
    return this.castControl((channel) => channel.adjustVolume(name === "volume_up" ? step : -step));
  }

  /**
   * The caller waits at most `commandTimeoutMs` for its command to start;
   * after that it is told `queued` and the command stays in line.
   */
  private enqueue(name: string, run: CommandRun): Promise<CommandResult> {
    return new Promise((resolve) => {
      let answered = false;
      let timer: NodeJS.Timeout | undefined;
      const settle = (result: CommandResult) => {
        if (timer) {
          clearTimeout(timer);
          timer = undefined;
        }
        if (!answered) {
          answered = true;
          resolve(result);
        } else if (result.status === "error") {
          console.warn(`[DeviceSession ${this.config.id}] queued ${name} failed: ${result.kind} ${result.message}`);
        }
      };
      const item: QueuedCommand = { name, run, settle };

      if (this.queue.length >= this.deps.settings.commandQueueLimit) {
        const dropped = this.queue.shift();
        if (dropped) {
          console.warn(`[DeviceSession ${this.config.id}] queue full, dropping ${dropped.name}`);
          dropped.settle(failure("queue_overflow", `command ${dropped.name} dropped: queue is full`));
        }
      }
      this.queue.push(item);
      timer = setTimeout(() => {
        timer = undefined;
        if (this.queue.includes(item)) {
          settle({ status: "queued" });
        }
      }, this.deps.settings.commandTimeoutMs);
      timer.unref();
      this.pump();
    });
  }

  private enqueueDetached(name: string, run: CommandRun): void {
    this.enqueue(name, run).then((result) => {
      if (result.status === "error") {
        console.warn(`[DeviceSession ${this.config.id}] queued ${name} failed: ${result.kind} ${result.message}`);
      }
    }, (error: unknown) => console.error(`[DeviceSession ${this.config.id}] queued ${name} crashed: ${describeError(error)}`));
  }

  private failQueued(kind: "device_unreachable" | "pairing_required", message: string): void {
    const pending = this.queue.splice(0, this.queue.length);
    for (const item of pending) {
      item.settle(failure(kind, message));
    }
  }

  /** Callers waiting behind a lost connection are told their command is queued. */
  private releaseWaiters(): void {
    for (const item of this.queue) {
      item.settle({ status: "queued" });
    }
  }

  private pump(): void {
    if (this.pumping || this.currentState !== "connected" || this.queue.length === 0) {
      return;
    }
    this.pumping = true;
    this.drain()
      .catch((error) => console.error(`[DeviceSession ${this.config.id}] command pump failed: ${describeError(error)}`))
      .finally(() => {
        this.pumping = false;
        this.pump();
      });
  }

  private async drain(): Promise<void> {
    while (this.currentState === "connected" && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      let result: CommandResult;
      try {
        result = await withTimeout(next.run(), this.deps.settings.commandTimeoutMs, `command ${next.name}`);
      } catch (error) {
        result = failure(error instanceof BridgeError ? error.kind : "device_unreachable", describeError(error));
        this.handleTransportLoss(`command ${next.name} failed: ${describeError(error)}`);
      }
      next.settle(result);
    }
  }

  private handleTransportLoss(reason: string): void {
    if (this.closed || this.currentState !== "connected") {
      return;
    }
    console.warn(`[DeviceSession ${this.config.id}] connection lost: ${reason}`);
    this.dropConnection();
    this.beginConnect("reconnecting", this.backoff.next());
  }

  private dropConnection(): void {
    this.mixer?.detach();
    this.power = "unknown";
    this.deps.client.disconnect();
  }

  private cancelLifecycle(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
    this.pendingCertificate = undefined;
    const controller = this.lifecycle;
    this.lifecycle = undefined;
    if (controller && !controller.signal.aborted) {
      controller.abort();
      this.deps.client.disconnect();
    }
  }

  /** Without a mode the current state is kept until the connection settles. */
  private beginConnect(mode?: "connecting" | "reconnecting", initialDelayMs = 0): void {
    this.cancelLifecycle();
    const controller = new AbortController();
    this.lifecycle = controller;
    if (mode) {
      this.setState(mode);
    }
    this.connectLoop(controller.signal, initialDelayMs).catch((error) => {
      console.error(`[DeviceSession ${this.config.id}] connect loop failed: ${describeError(error)}`);
      if (!controller.signal.aborted) {
        this.enterError(describeError(error));
      }
    });
  }

  private async connectLoop(signal: AbortSignal, initialDelayMs: number): Promise<void> {
    if (initialDelayMs > 0 && !(await pause(initialDelayMs, signal))) {
      return;
    }
    if (!this.deps.leases.acquire(this.config.id, this)) {
      console.warn(`[DeviceSession ${this.config.id}] device is controlled by another session`);
      this.enterError("device is controlled by another session");
      return;
    }
    const { settings } = this.deps;

    while (!signal.aborted) {
      let certificate: ClientCertificate | undefined;
      try {
        certificate = await this.deps.certificates.load(this.config.id);
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        await this.beginPairing(signal, `client certificate unreadable: ${describeError(error)}`);
        return;
      }
      if (signal.aborted) {
        return;
      }
      if (!certificate) {
        await this.beginPairing(signal, "no client certificate");
        return;
      }

      const started = Date.now();
      const outcome = await this.attemptConnect(certificate, signal);
      if (signal.aborted) {
        return;
      }
      if (outcome.kind === "connected") {
        this.onConnected(outcome.info);
        return;
      }
      if (outcome.kind === "needs_pairing") {
        await this.beginPairing(signal, "device does not trust the client certificate");
        return;
      }

      this.failedAttempts += 1;
      if (this.failedAttempts >= settings.reconnect.maxAttempts) {
        console.error(`[DeviceSession ${this.config.id}] giving up after ${this.failedAttempts} attempts: ${outcome.reason}`);
        this.enterError(outcome.reason);
        return;
      }
      this.setState("reconnecting");
      const rediscoverEvery = settings.rediscoverEvery ?? REDISCOVER_EVERY;
      if (this.failedAttempts % rediscoverEvery === 0) {
        await this.rediscover(signal);
      }
      const wait = this.backoff.next(Date.now() - started);
      console.warn(
        `[DeviceSession ${this.config.id}] cannot connect to ${this.config.address}, retrying in ${wait}ms: ${outcome.reason}`
      );
      if (!(await pause(wait, signal))) {
        return;
      }
    }
  }

  private async attemptConnect(certificate: ClientCertificate, signal: AbortSignal): Promise<ConnectOutcome> {
    const attempt = new AbortController();
    const forward = () => attempt.abort();
    signal.addEventListener("abort", forward, { once: true });
    try {
      return await withTimeout(
        this.deps.client.connect(this.config.address, certificate, attempt.signal),
        this.deps.settings.connectTimeoutMs,
        "connect"
      );
    } catch (error) {
      attempt.abort();
      this.deps.client.disconnect();
      return { kind: "failed", reason: describeError(error) };
    } finally {
      signal.removeEventListener("abort", forward);
    }
  }

  private async rediscover(signal: AbortSignal): Promise<void> {
    const resolver = this.deps.addressResolver;
    if (!resolver) {
      return;
    }
    try {
      const address = await resolver.resolve(this.config);
      if (signal.aborted || !address || address === this.config.address) {
        return;
      }
      console.log(`[DeviceSession ${this.config.id}] address changed ${this.config.address} -> ${address}`);
      this.config = { ...this.config, address };
      this.emit("addressChanged", address);
      this.emit("config", this.deviceConfig);
    } catch (error) {
      console.warn(`[DeviceSession ${this.config.id}] discovery failed: ${describeError(error)}`);
    }
  }

  private onConnected(info: DeviceInfo): void {
    this.lifecycle = undefined;
    this.failedAttempts = 0;
    this.pairingFailures = 0;
    this.backoff.reset();

    if (info.manufacturer !== this.config.manufacturer || info.model !== this.config.model || this.config.authError) {
      this.config = { ...this.config, manufacturer: info.manufacturer, model: info.model, authError: false };
      this.emit("config", this.deviceConfig);
    }
    this.profile = this.selectProfile(info);
    console.log(
      `[DeviceSession ${this.config.id}] connected to ${info.manufacturer} ${info.model} using profile ${this.profile.name}`
    );
    this.setState("connected");
    this.publish({ features: this.profile.features, source_list: sourceList(), pairing_failures: 0 });
    if (this.config.castEnabled) {
      this.mixer?.attach(this.config.address);
    }
    this.pump();
  }

  private selectProfile(info: DeviceInfo): DeviceProfile {
    const override = this.config.profileOverride;
    if (override) {
      const profile = this.deps.profiles.byName(override);
      if (profile) {
        return profile;
      }
      console.warn(`[DeviceSession ${this.config.id}] unknown profile override ${override}`);
    }
    return this.deps.profiles.resolve(info.manufacturer, info.model);
  }

  private async beginPairing(signal: AbortSignal, reason: string): Promise<void> {
    console.warn(`[DeviceSession ${this.config.id}] pairing required: ${reason}`);
    this.setState("pairing");
    this.failQueued("pairing_required", `pairing required: ${reason}`);
    if (!this.config.authError) {
      this.config = { ...this.config, authError: true };
      this.emit("config", this.deviceConfig);
    }
    this.publish({ state: "unavailable", pairing_failures: this.pairingFailures });

    try {
      const candidate = await this.deps.client.createCertificate();
      if (signal.aborted) {
        return;
      }
      await withTimeout(
        this.deps.client.startPairing(this.config.address, candidate, signal),
        this.deps.settings.connectTimeoutMs,
        "start pairing"
      );
      if (signal.aborted) {
        return;
      }
      this.pendingCertificate = candidate;
      console.log(`[DeviceSession ${this.config.id}] waiting for PIN`);
    } catch (error) {
      if (!signal.aborted) {
        console.error(`[DeviceSession ${this.config.id}] cannot start pairing: ${describeError(error)}`);
      }
    }
  }

  private enterError(reason: string): void {
    this.lifecycle = undefined;
    this.dropConnection();
    this.setState("error");
    this.failQueued("device_unreachable", reason);
    const timer = setTimeout(() => {
      this.retryTimer = undefined;
      if (!this.closed && this.currentState === "error") {
        console.log(`[DeviceSession ${this.config.id}] retrying after error`);
        this.failedAttempts = 0;
        this.beginConnect("connecting");
      }
    }, this.deps.settings.errorRetryMs);
    timer.unref();
    this.retryTimer = timer;
  }

  private setState(next: SessionState): void {
    if (next === this.currentState) {
      return;
    }
    const previous = this.currentState;
    this.currentState = next;
    console.log(`[DeviceSession ${this.config.id}] ${previous} -> ${next}`);
    if (previous === "connected" && (next === "connecting" || next === "reconnecting")) {
      this.releaseWaiters();
    }
    const update: AttributeUpdate = { connection: next };
    if (next === "error") {
      update.state = "unavailable";
    }
    this.publish(update);
    this.emit("state", next, previous);
  }

  private publish(update: AttributeUpdate): void {
    Object.assign(this.attributes, update);
    this.emit("attributes", update);
  }

  private applyMediaDelta(delta: AttributeUpdate): void {
    if (this.closed || this.currentState !== "connected") {
      return;
    }
    this.publish(delta);
  }

  private readonly handlePower = (isOn: boolean): void => {
    if (this.currentState !== "connected") {
      return;
    }
    this.power = isOn ? "on" : "off";
    this.publish({ state: isOn ? "on" : "off" });
    if (!this.config.castEnabled || !this.mixer) {
      return;
    }
    if (!isOn) {
      this.mixer.detach();
    } else if (!this.mixer.activeChannel) {
      this.mixer.attach(this.config.address);
    }
  };

  private readonly handleApp = (appId: string): void => {
    if (this.currentState !== "connected") {
      return;
    }
    this.foregroundApp = appId;
    const idle = isHomescreenApp(appId) || isStandbyApp(appId);
    const update: AttributeUpdate = { source: friendlyAppName(appId) };
    if (isStandbyApp(appId)) {
      update.state = "standby";
    }
    if (!this.mixer?.activeChannel) {
      update.media_title = idle ? "" : friendlyAppName(appId);
    }
    this.publish(update);
    if (this.config.externalMetadata && this.deps.appMetadata) {
      this.lookupAppMetadata(appId).catch((error) =>
        console.warn(`[DeviceSession ${this.config.id}] app metadata lookup failed: ${describeError(error)}`)
      );
    }
  };

  private async lookupAppMetadata(appId: string): Promise<void> {
    const metadata = await this.deps.appMetadata?.lookup(appId);
    if (!metadata || this.currentState !== "connected" || this.foregroundApp !== appId) {
      return;
    }
    const update: AttributeUpdate = {};
    if (metadata.name) {
      update.source = metadata.name;
    }
    if (metadata.iconUrl && isValidImageUrl(metadata.iconUrl) && !this.mixer?.activeChannel) {
      update.media_image_url = metadata.iconUrl;
    }
    if (Object.keys(update).length > 0) {
      this.publish(update);
    }
  }

  private readonly handleVolume = (info: VolumeInfo): void => {
    if (this.currentState !== "connected") {
      return;
    }
    this.publish({ volume: info.level, muted: info.muted });
  };

  private readonly handleClosed = (reason: CloseReason): void => {
    if (this.closed || this.currentState !== "connected") {
      return;
    }
    console.warn(`[DeviceSession ${this.config.id}] connection closed (${reason})`);
    this.dropConnection();
    if (reason === "auth") {
      if (!this.deps.leases.acquire(this.config.id, this)) {
        this.enterError("device is controlled by another session");
        return;
      }
      const controller = new AbortController();
      this.lifecycle = controller;
      this.beginPairing(controller.signal, "device rejected the client certificate").catch((error) =>
        console.error(`[DeviceSession ${this.config.id}] pairing failed: ${describeError(error)}`)
      );
      return;
    }
    this.beginConnect("reconnecting", reason === "standby" ? 0 : this.backoff.next());
  };
}
